export type { CliArgs, CliError } from "./cli.js"
export type { AppConfig } from "./config.js"
export type { Cursor } from "./cursor.js"
export { advance, expectStructural, isAtEnd, makeCursor, peek } from "./cursor.js"
export type {
  AppError,
  ConfigError,
  DanglingEscape,
  DocumentError,
  FileError,
  InvalidEscapeSequence,
  InvalidUtf8,
  JsonError,
  MalformedNumber,
  ParseError,
  TokenizeError,
  UnescapedControlCharacter,
  UnexpectedEndOfInput,
  UnexpectedToken,
  UnterminatedEscape,
  UnterminatedString
} from "./errors.js"
export { renderAppError, renderJsonError } from "./errors.js"
export type { Json, JsonArray, JsonBoolean, JsonNull, JsonNumber, JsonObject, JsonString, JsonValue } from "./json.js"
export {
  fromNative,
  jsonArray,
  jsonBoolean,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString,
  toNative
} from "./json.js"
export { parse, parseArray, parseNumber, parseObject, parseString, parseTokens, parseValue } from "./parser.js"
export { renderTokenListing } from "./report.js"
export { quoteString, serialize } from "./serialize.js"
export type { LiteralToken, QuoteToken, StructuralChar, StructuralToken, Token } from "./token.js"
export { tokenText } from "./token.js"
export { decodeInput, tokenize } from "./tokenize.js"
