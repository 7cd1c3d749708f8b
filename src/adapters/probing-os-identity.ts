import type { CommandProbe, OsIdentityProvider } from "../interfaces/os-identity.js";

/**
 * Identifies the OS by running commands through the active runner:
 * a working `uname -s` means POSIX, a `ver` banner naming Windows means Windows.
 */
export class ProbingOsIdentity implements OsIdentityProvider {
  async isWindows(probe: CommandProbe): Promise<boolean> {
    const uname = await probe("uname -s");
    if (uname.exitStatus === 0 && uname.stdout.trim().length > 0) return false;

    const ver = await probe("cmd.exe /c ver");
    return ver.exitStatus === 0 && /windows/i.test(ver.stdout);
  }
}
