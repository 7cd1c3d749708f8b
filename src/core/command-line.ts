/**
 * Decides whether a command line can be executed directly or needs the
 * system shell, mirroring how POSIX `exec` wrappers treat a single string.
 * @module
 */

const SHELL_METACHARACTERS = /[*?{}[\]<>()~&|\\$;'`"\n#]/;

/** Leading `NAME=value` makes the shell apply an environment assignment. */
const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

const RESERVED_WORDS = new Set([
  // reserved words
  "!",
  "case",
  "do",
  "done",
  "elif",
  "else",
  "esac",
  "fi",
  "for",
  "if",
  "in",
  "then",
  "until",
  "while",
  // special builtins
  ".",
  ":",
  "break",
  "continue",
  "eval",
  "exec",
  "exit",
  "export",
  "readonly",
  "return",
  "set",
  "shift",
  "times",
  "trap",
  "unset",
]);

export type ExecutionPlan =
  | { mode: "shell"; commandLine: string }
  | { mode: "direct"; file: string; args: string[] }
  | { mode: "empty" };

export function planExecution(commandLine: string): ExecutionPlan {
  const argv = commandLine.trim().split(/\s+/).filter(Boolean);
  const [file, ...args] = argv;
  if (file === undefined) return { mode: "empty" };

  if (
    SHELL_METACHARACTERS.test(commandLine) ||
    ENV_ASSIGNMENT.test(file) ||
    RESERVED_WORDS.has(file)
  ) {
    return { mode: "shell", commandLine };
  }
  return { mode: "direct", file, args };
}
