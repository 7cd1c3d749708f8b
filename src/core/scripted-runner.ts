import type { CommandResult, CommandRunner } from "../interfaces/command-runner.js";
import type { ProcessInvoker } from "../interfaces/process-invoker.js";
import { encodeScript } from "./encoded-script.js";

const NEEDS_QUOTING = /[\s"']/;
const SPECIAL_IN_DOUBLE_QUOTES = /["$`]|\\(?=["$`\\]|$)/g;

/**
 * Double-quote a host path containing whitespace or quotes so the shell keeps
 * it as one word. Escapes `"`, `$` and backtick, plus any backslash that would
 * otherwise escape one of them or the closing quote.
 */
function quoteHost(host: string): string {
  if (!NEEDS_QUOTING.test(host)) return host;
  const escaped = host.replace(SPECIAL_IN_DOUBLE_QUOTES, "\\$&");
  return `"${escaped}"`;
}

/**
 * Windows fallback: one scripting host process per command, with the script
 * passed as a single `-EncodedCommand` argument.
 */
export class ScriptedRunner implements CommandRunner {
  readonly kind = "scripted" as const;

  constructor(
    private readonly invoker: ProcessInvoker,
    private readonly scriptingHost = "powershell",
  ) {}

  /** The command line handed to the invoker for `script`. */
  buildCommandLine(script: string): string {
    return `${quoteHost(this.scriptingHost)} -NoProfile -NonInteractive -EncodedCommand ${encodeScript(script)}`;
  }

  async runCommand(script: string): Promise<CommandResult> {
    return this.invoker.invoke(this.buildCommandLine(script));
  }

  dispose(): void {
    // No persistent resources to clean up
  }
}
