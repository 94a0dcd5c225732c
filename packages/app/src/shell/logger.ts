import * as Logger from "effect/Logger"

// CHANGE: route Effect log output to stderr as prefixed plain lines
// WHY: stdout carries event lines and reports; diagnostics must not interleave with them
// PURITY: SHELL
// EFFECT: writes to process.stderr
// INVARIANT: one line per log call

const renderMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map((part) => String(part)).join(" ") : String(message)

export const cliLogger = Logger.make(({ logLevel, message }) => {
  process.stderr.write(`[begone] ${logLevel.label.toLowerCase()}: ${renderMessage(message)}\n`)
})

export const CliLoggerLive = Logger.replace(Logger.defaultLogger, cliLogger)
