import type { ByteSizeParseError, ByteSizeParseErrorCode, ByteSizeParseErrorKind } from "./types.ts";

const DEFAULT_MESSAGES: Record<ByteSizeParseErrorCode, string> = {
  empty_input: "cannot parse empty string",
  invalid_number: "string does not start with a valid number",
  invalid_units: "string has invalid units",
  trailing_input: "unexpected characters after units",
  fractional_bytes: "fractional byte count requires a unit prefix",
  overflow: "number is too large",
};

export function errorKindOf(code: ByteSizeParseErrorCode): ByteSizeParseErrorKind {
  return code === "overflow" ? "overflow" : "syntax";
}

export function createParseError(
  code: ByteSizeParseErrorCode,
  input: string,
  message?: string
): ByteSizeParseError {
  return {
    name: "ByteSizeParseError",
    kind: errorKindOf(code),
    code,
    message: message ?? DEFAULT_MESSAGES[code],
    input,
  };
}

export function isByteSizeParseError(x: unknown): x is ByteSizeParseError {
  return (
    typeof x === "object" &&
    x !== null &&
    "name" in x &&
    x.name === "ByteSizeParseError" &&
    "code" in x &&
    "kind" in x
  );
}
