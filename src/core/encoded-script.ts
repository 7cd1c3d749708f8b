import { EncodingError } from "../errors.js";

/** Keeps PowerShell progress records out of the captured streams. */
export const QUIET_PREAMBLE = "$ProgressPreference='SilentlyContinue';";

/**
 * Byte encoding applied before base64.
 * `-EncodedCommand` requires UTF-16LE; the pipe server decodes UTF-8.
 */
export type ScriptEncoding = "utf16le" | "utf8";

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function toBase64(text: string, encoding: ScriptEncoding): string {
  const match = UNPAIRED_SURROGATE.exec(text);
  if (match) {
    throw new EncodingError(
      `Script contains an unpaired surrogate at index ${match.index} and cannot be encoded`,
    );
  }
  return Buffer.from(text, encoding).toString("base64");
}

/** Encode a script verbatim, for hosts that take `-EncodedCommand`. */
export function encodePowerShellCommand(script: string): string {
  return toBase64(script, "utf16le");
}

/** Prefix the quiet preamble and encode into a single base64 line. */
export function encodeScript(command: string, encoding: ScriptEncoding = "utf16le"): string {
  return toBase64(QUIET_PREAMBLE + command, encoding);
}

/** Inverse of encodeScript; the result still carries the preamble. */
export function decodeScript(encoded: string, encoding: ScriptEncoding = "utf16le"): string {
  return Buffer.from(encoded, "base64").toString(encoding);
}
