export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { describeErrors, type SetFromEnvOptions, setFromArgs, setFromEnv } from "./core/apply"
export { binarySearch, compareKeys } from "./core/binary-search"
export { converters, type OptionSpec } from "./core/converters"
export { formatHelp, HelpPrinter, type HelpOptions, type HelpSink, printHelp } from "./core/help"
export {
  type ConfiguratorOptions,
  configure,
  InstanceConfigurator,
} from "./core/instance-configurator"
export { collisions, externalName, type KeyTarget, NameMatcher } from "./core/key-names"
export {
  MultiConfigurator,
  type MultiConfiguratorOptions,
  manage,
} from "./core/multi-configurator"
export {
  fieldBinding,
  Parameter,
  ParameterBuilder,
  type ParameterOptions,
  parameter,
} from "./core/parameter"
export {
  ARG_PREFIX,
  type ParseArgsOptions,
  type ParseEnvOptions,
  type ParseResult,
  parseArgs,
  parseEnv,
} from "./core/parse"
export { ARGS_SOURCE, type ReconcileOptions, reconcile } from "./core/reconcile"
export type {
  Batch,
  ConfigurationInfo,
  Configurator,
  ConfigVisitor,
  ErrorMap,
  IllegalValueSetError,
  ParameterEntry,
  SetError,
  UnknownKeyError,
} from "./ports/configurator"
export type { Converter, OptionInfo } from "./ports/converter"
export type { Binding, ConfigParameter } from "./ports/parameter"
export type { ReconcileReport, SourcedError } from "./ports/report"
export type { ConfigSource } from "./ports/source"
