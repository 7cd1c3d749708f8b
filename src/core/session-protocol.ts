import { z } from "zod";
import { ProtocolError } from "../errors.js";
import type { CommandResult } from "../interfaces/command-runner.js";
import { encodeScript } from "./encoded-script.js";

/** Payload the pipe server writes back for each request. */
export const sessionResponseSchema = z
  .object({
    stdout: z.string(),
    stderr: z.string(),
    exit_status: z.number().int(),
  })
  .strict();

export type SessionResponse = z.infer<typeof sessionResponseSchema>;

const BASE64_LINE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** One request line: base64 of the UTF-8 script, quiet preamble included. */
export function encodeRequest(command: string): string {
  return encodeScript(command, "utf8");
}

/** Build the line a server sends for a result. */
export function encodeResponse(result: CommandResult): string {
  const payload: SessionResponse = {
    stdout: result.stdout,
    stderr: result.stderr,
    exit_status: result.exitStatus,
  };
  return Buffer.from(JSON.stringify(payload), "utf8").toString("base64");
}

/** Decode and validate one response line. Throws ProtocolError on any mismatch. */
export function decodeResponse(line: string): CommandResult {
  const trimmed = line.trim();
  if (trimmed.length === 0 || !BASE64_LINE.test(trimmed)) {
    throw new ProtocolError("Session response is not a base64 line");
  }

  const text = Buffer.from(trimmed, "base64").toString("utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ProtocolError("Session response is not valid JSON", { cause: err });
  }

  const validation = sessionResponseSchema.safeParse(parsed);
  if (!validation.success) {
    throw new ProtocolError(`Unexpected session response: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const { stdout, stderr, exit_status } = validation.data;
  return { stdout, stderr, exitStatus: exit_status };
}
