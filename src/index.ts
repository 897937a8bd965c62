export { Checkpoint, CheckpointRegistry } from "./checkpoint.js";
export { CLI_COMMANDS, resolveCliConfig } from "./config.js";
export type { CliCommand, CliConfig, ConfigValidationResult, StreamTokensOptions } from "./config.js";
export { CheckpointRegistryError, OutOfWindowError, ParseError } from "./errors.js";
export type { OutOfWindowCode, WindowBounds } from "./errors.js";
export { createLogger, silentLogger } from "./log.js";
export type { Logger, LoggerOptions } from "./log.js";
export * as parsers from "./parsers.js";
export type { ValueParser } from "./parsers.js";
export { chars, fdBytes, fdChars, FusedSource, toIterator } from "./sources.js";
export type { Source } from "./sources.js";
export { StreamTokens } from "./stream-tokens.js";
export { TextStreamTokens } from "./text-stream-tokens.js";
export type { ParseResult } from "./text-stream-tokens.js";
export { collect, optional, sepBy, skipWhile, takeWhile, token, tokens } from "./tokens.js";
export type { Predicate, Tokens } from "./tokens.js";
export { ArrayWindow, TextWindow } from "./window.js";
export type { WindowBuffer } from "./window.js";
