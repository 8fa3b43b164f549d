import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";

export interface KeyValueStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }
}

const storedValuesSchema = z.record(z.string());

/** Keeps every key in one JSON object on disk. Writes are applied in call order. */
export class FileKeyValueStore implements KeyValueStore {
  private pending = Promise.resolve();
  private cache: Map<string, string> | null = null;

  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<string | undefined> {
    const values = await this.load();
    return values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    const values = await this.load();
    values.set(key, value);
    const serialized = JSON.stringify(Object.fromEntries(values), null, 2);
    this.pending = this.pending
      .catch(() => undefined)
      .then(async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, serialized, "utf-8");
      });
    await this.pending;
  }

  private async load(): Promise<Map<string, string>> {
    if (this.cache) {
      return this.cache;
    }
    const raw = await this.readRaw();
    const values = raw === undefined ? new Map<string, string>() : this.parse(raw);
    this.cache ??= values;
    return this.cache;
  }

  private async readRaw(): Promise<string | undefined> {
    try {
      return await readFile(this.filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }

  private parse(raw: string): Map<string, string> {
    try {
      const parsed = storedValuesSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return new Map(Object.entries(parsed.data));
      }
    } catch (error) {
      console.warn(`Key-value file ${this.filePath} is not valid JSON`, error);
      return new Map();
    }
    console.warn(`Ignoring malformed key-value file ${this.filePath}`);
    return new Map();
  }
}
