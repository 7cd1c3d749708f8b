import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError, ConnectionClosedError, SessionAcquisitionError } from "../errors.js";
import type { OsIdentityProvider } from "../interfaces/os-identity.js";
import { MockProcessInvoker } from "../testing/mock-process-invoker.js";
import { MockProcessManager } from "../testing/mock-process-manager.js";
import { StubPipeServer } from "../testing/stub-pipe-server.js";
import { LocalConnection } from "./local-connection.js";
import { acquirePipeSession } from "./pipe-session.js";

const posix: OsIdentityProvider = { isWindows: async () => false };
const windows: OsIdentityProvider = { isWindows: async () => true };

describe("LocalConnection", () => {
  let connection: LocalConnection | undefined;

  afterEach(() => {
    connection?.close();
    connection = undefined;
  });

  it("describes itself as a local connection", async () => {
    connection = await LocalConnection.open({ osIdentity: posix });
    expect(connection.local).toBe(true);
    expect(connection.uri).toBe("local://");
    expect(connection.loginCommand).toBeNull();
  });

  it("selects the shell runner on POSIX and runs commands through it", async () => {
    connection = await LocalConnection.open({ osIdentity: posix });
    expect(connection.runnerKind).toBe("shell");
    await expect(connection.runCommand("echo hello")).resolves.toEqual({
      stdout: "hello\n",
      stderr: "",
      exitStatus: 0,
    });
  });

  it("converts a missing executable into exit status 1", async () => {
    connection = await LocalConnection.open({ osIdentity: posix });
    await expect(connection.runCommand("no-such-executable-for-localrun")).resolves.toEqual({
      stdout: "",
      stderr: "",
      exitStatus: 1,
    });
  });

  it("routes OS probes through the pass-through runner before selection", async () => {
    const processInvoker = new MockProcessInvoker();
    processInvoker.setResult("uname -s", { stdout: "Linux\n", stderr: "", exitStatus: 0 });
    const probing: OsIdentityProvider = {
      isWindows: async (probe) => (await probe("uname -s")).exitStatus !== 0,
    };

    connection = await LocalConnection.open({
      osIdentity: probing,
      processInvoker,
      commandWrapper: { run: (cmd) => `sudo ${cmd}` },
    });
    await connection.runCommand("id");

    // the probe is not wrapped; commands after selection are
    expect(processInvoker.invokeCalls).toEqual(["uname -s", "sudo id"]);
  });

  it("uses a pipe session on Windows when one can be acquired", async () => {
    const stub = new StubPipeServer((command) => ({ stdout: `${command}\r\n`, stderr: "", exitStatus: 0 }));
    await stub.listen("localrun_conn");
    const processManager = new MockProcessManager();

    connection = await LocalConnection.open({
      osIdentity: windows,
      processManager,
      pipeConnector: stub.connector,
      acquireSession: (options) =>
        acquirePipeSession({ ...options, generateSessionId: () => "localrun_conn" }),
    });

    expect(connection.runnerKind).toBe("session");
    await expect(connection.runCommand("hostname")).resolves.toEqual({
      stdout: "hostname\r\n",
      stderr: "",
      exitStatus: 0,
    });

    connection.close();
    expect(processManager.lastProcess?.killCalls).toEqual(["SIGKILL"]);
    await stub.close();
  });

  it("falls back to the scripted runner on Windows when acquisition fails", async () => {
    const processInvoker = new MockProcessInvoker();
    connection = await LocalConnection.open({
      osIdentity: windows,
      processInvoker,
      acquireSession: async () => ({ ok: false, error: new SessionAcquisitionError("no pipe") }),
    });

    expect(connection.runnerKind).toBe("scripted");
    await connection.runCommand("Get-Date");
    expect(processInvoker.lastCommandLine).toMatch(
      /^powershell -NoProfile -NonInteractive -EncodedCommand [A-Za-z0-9+/]+=*$/,
    );
  });

  it("rejects commands after close()", async () => {
    connection = await LocalConnection.open({ osIdentity: posix });
    connection.close();
    connection.close();
    await expect(connection.runCommand("echo late")).rejects.toBeInstanceOf(ConnectionClosedError);
  });

  it("validates configuration before doing anything", async () => {
    const osIdentity = { isWindows: vi.fn(async () => false) };
    await expect(
      LocalConnection.open({ osIdentity, config: { pipeConnectAttempts: 0 } }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(osIdentity.isWindows).not.toHaveBeenCalled();
  });

  it("logs the selected runner", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    connection = await LocalConnection.open({ osIdentity: posix, logger });
    expect(logger.info).toHaveBeenCalledWith("Local connection ready", {
      component: "local-connection",
      runner: "shell",
    });
  });
});
