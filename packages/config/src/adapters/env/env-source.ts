import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>

  /** @default "env" */
  name?: string
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.name = options.name ?? "env"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string | undefined>> {
    return { ...this.env }
  }
}
