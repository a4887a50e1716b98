type LogArgs = [message: () => string] | unknown[]

export const debugLogger = (cond: boolean) =>
  cond
    ? (...args: LogArgs) => {
      const [first] = args
      if (args.length === 1 && typeof first === "function") {
        console.log(first())
      } else {
        console.log(...args)
      }
    }
    : (..._args: LogArgs) => {}

export const debugLog = debugLogger(process.env.DEBUG === "true")

export function debugJson(obj: unknown, indent = 0): string {
  return JSON.stringify(obj, (_key: string, value: unknown) => {
    if (typeof value === "bigint") {
      return value.toString() + "n"
    }
    return value
  }, indent)
}
