/**
 * File Store
 * JSON documents on disk:
 *   <dataDir>/sessions/<sessionId>.json
 *   <dataDir>/conversations/<conversationId>.json
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { MarketIntelError } from "../core/errors.js";
import {
  AnalysisSessionSchema,
  ConversationTurnSchema,
  type AnalysisSession,
  type ConversationTurn,
} from "../schemas/session.js";
import { DocumentSessionStore } from "./base.js";

const TurnsSchema = z.array(ConversationTurnSchema);

export interface JsonFileStoreOptions {
  basePath: string;
  prettyPrint?: boolean;
}

/**
 * Keyed JSON documents under a base directory, validated on read
 */
export class JsonFileStore {
  private readonly basePath: string;
  private readonly prettyPrint: boolean;

  constructor(options: JsonFileStoreOptions) {
    this.basePath = options.basePath;
    this.prettyPrint = options.prettyPrint ?? true;
  }

  getPath(key: string): string {
    if (!/^[\w:.-]+$/.test(key) || key.includes("..")) {
      throw new MarketIntelError(`Invalid storage key: ${key}`, "STORE_INVALID_KEY");
    }
    return path.join(this.basePath, `${key}.json`);
  }

  async read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    try {
      const content = await fs.readFile(this.getPath(key), "utf-8");
      return schema.parse(JSON.parse(content));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(key: string, data: unknown): Promise<void> {
    const filePath = this.getPath(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    const content = this.prettyPrint ? JSON.stringify(data, null, 2) : JSON.stringify(data);

    // readers only ever see complete documents
    const tmpPath = `${filePath}.tmp`;
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, filePath);
  }

  async delete(key: string): Promise<boolean> {
    try {
      await fs.unlink(this.getPath(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.basePath, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
        .map((entry) => entry.name.replace(/\.json$/, ""));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }
}

export class FileSessionStore extends DocumentSessionStore {
  private readonly sessions: JsonFileStore;
  private readonly conversations: JsonFileStore;

  constructor(dataDir: string) {
    super();
    this.sessions = new JsonFileStore({ basePath: path.join(dataDir, "sessions") });
    this.conversations = new JsonFileStore({ basePath: path.join(dataDir, "conversations") });
  }

  protected readSession(id: string): Promise<AnalysisSession | null> {
    return this.sessions.read(id, AnalysisSessionSchema);
  }

  protected writeSession(session: AnalysisSession): Promise<void> {
    return this.sessions.write(session.id, session);
  }

  protected removeSession(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }

  protected async readAllSessions(): Promise<AnalysisSession[]> {
    const ids = await this.sessions.list();
    const sessions: AnalysisSession[] = [];

    for (const id of ids) {
      try {
        const session = await this.sessions.read(id, AnalysisSessionSchema);
        if (session) sessions.push(session);
      } catch (error) {
        this.log.warn("Skipping unreadable session file", {
          sessionId: id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return sessions;
  }

  protected async appendTurn(conversationId: string, turn: ConversationTurn): Promise<void> {
    const turns = (await this.conversations.read(conversationId, TurnsSchema)) ?? [];
    turns.push(turn);
    await this.conversations.write(conversationId, turns);
  }

  protected async readTurns(conversationId: string): Promise<ConversationTurn[]> {
    return (await this.conversations.read(conversationId, TurnsSchema)) ?? [];
  }

  protected async removeTurns(conversationId: string): Promise<void> {
    await this.conversations.delete(conversationId);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
