/**
 * Session store exports
 */

import type { Config } from "../core/config.js";
import { ConfigError } from "../core/errors.js";
import { FileSessionStore } from "./file.js";
import { MemorySessionStore } from "./memory.js";
import { SupabaseSessionStore, getSupabase } from "./supabase.js";
import type { SessionStore } from "./types.js";

export * from "./types.js";
export { DocumentSessionStore, matchesFilter } from "./base.js";
export { MemorySessionStore } from "./memory.js";
export { FileSessionStore, JsonFileStore } from "./file.js";
export { SupabaseSessionStore, SupabaseStoreError, getSupabase, resetSupabase } from "./supabase.js";

export function createSessionStore(config: Config): SessionStore {
  switch (config.store.kind) {
    case "memory":
      return new MemorySessionStore();
    case "file":
      return new FileSessionStore(config.store.dataDir);
    case "supabase": {
      const supabase = config.store.supabase;
      if (!supabase) {
        throw new ConfigError("SESSION_STORE=supabase requires SUPABASE_URL and SUPABASE_KEY");
      }
      return new SupabaseSessionStore(getSupabase(supabase.url, supabase.key));
    }
  }
}
