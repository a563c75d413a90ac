import { LogLevels, logLevelName, logLevelNames } from "../log-level"

describe("log levels", () => {
  it("orders names by severity", () => {
    const severities = logLevelNames.map((name) => LogLevels[name])

    expect(severities).toEqual([10, 20, 30, 40, 50, 60])
  })

  it("maps severities back to names", () => {
    expect(logLevelName(40)).toBe("warn")
    expect(logLevelName(10)).toBe("trace")
    expect(logLevelName(35)).toBeUndefined()
  })
})
