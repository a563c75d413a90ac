import { BaseError } from "../base-error"
import {
  ConfigurationError,
  ConversionError,
  DuplicateKeyError,
  IllegalValueError,
  NameCollisionError,
} from "../config-errors"

describe("ConfigurationError", () => {
  it("defaults to the configuration code and is not operational", () => {
    const err = new ConfigurationError("configurators are empty")

    expect(err.code).toBe("configuration")
    expect(err.isOperational).toBe(false)
    expect(err.name).toBe("ConfigurationError")
    expect(err).toBeInstanceOf(BaseError)
  })
})

describe("DuplicateKeyError", () => {
  it("names the key in message, property and context", () => {
    const err = new DuplicateKeyError("port", { owners: ["server", "admin"] })

    expect(err.message).toBe('duplicate key "port"')
    expect(err.key).toBe("port")
    expect(err.code).toBe("duplicate_key")
    expect(err.context).toEqual({ key: "port", owners: ["server", "admin"] })
    expect(err).toBeInstanceOf(ConfigurationError)
  })
})

describe("NameCollisionError", () => {
  it("lists every collision in the message", () => {
    const err = new NameCollisionError("env", [
      { externalName: "MY_APP", keys: ["myApp", "my_app"] },
      { externalName: "A_B", keys: ["a.b", "aB"] },
    ])

    expect(err.message).toBe(
      "collisions for env names: MY_APP <- myApp, my_app; A_B <- a.b, aB",
    )
    expect(err.code).toBe("name_collision")
    expect(err.collisions).toHaveLength(2)
    expect(err).toBeInstanceOf(ConfigurationError)
  })
})

describe("IllegalValueError", () => {
  it("is operational and carries the value", () => {
    const cause = new Error("not a number")
    const err = new IllegalValueError("bad port", "eighty", {
      context: { key: "port" },
      cause,
    })

    expect(err.code).toBe("illegal_value")
    expect(err.isOperational).toBe(true)
    expect(err.value).toBe("eighty")
    expect(err.context).toEqual({ value: "eighty", key: "port" })
    expect(err.cause).toBe(cause)
  })
})

describe("ConversionError", () => {
  it("is not operational", () => {
    const err = new ConversionError("cannot render")

    expect(err.code).toBe("conversion")
    expect(err.isOperational).toBe(false)
  })
})
