import type { OsIdentityProvider } from "../interfaces/os-identity.js";

/** Answers from the platform Node.js itself runs on. */
export class PlatformOsIdentity implements OsIdentityProvider {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  async isWindows(): Promise<boolean> {
    return this.platform === "win32";
  }
}
