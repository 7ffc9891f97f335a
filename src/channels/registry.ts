import type { Platform } from "../conversation/types.js";
import type { PlatformAdapter } from "./adapter.js";

export class ChannelRegistry {
  private readonly adapters = new Map<Platform, PlatformAdapter>();

  register(adapter: PlatformAdapter): void {
    if (this.adapters.has(adapter.platform)) {
      throw new Error(`Channel adapter already registered: ${adapter.platform}`);
    }
    this.adapters.set(adapter.platform, adapter);
  }

  get(platform: Platform): PlatformAdapter | undefined {
    return this.adapters.get(platform);
  }

  has(platform: Platform): boolean {
    return this.adapters.has(platform);
  }

  list(): PlatformAdapter[] {
    return [...this.adapters.values()];
  }
}
