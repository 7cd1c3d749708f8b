/**
 * Run a command on this machine through whichever runner localrun selects.
 *
 *   npx tsx examples/run-local.ts "echo hello"
 */
import { LogLevel, LocalConnection, StructuredLogger } from "../src/index.js";

const command = process.argv[2] ?? "echo hello";
const connection = await LocalConnection.open({
  logger: new StructuredLogger({ level: LogLevel.DEBUG, component: "example" }),
});

try {
  const result = await connection.runCommand(command);
  process.stdout.write(result.stdout);
  process.stderr.write(result.stderr);
  process.exitCode = result.exitStatus;
} finally {
  connection.close();
}
