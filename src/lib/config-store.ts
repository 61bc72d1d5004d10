import { mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { castDraft } from "immer";
import { z } from "zod";
import { immer } from "zustand/middleware/immer";
import { createStore } from "zustand/vanilla";
import { CaptureError, describeError } from "./capture-errors";
import { expandHome } from "./output-path";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ConfigRecord = Record<string, JsonValue>;

export const CONFIG_ENV_VAR = "DESKGRAB_CONFIG";

export const DEFAULT_CONFIG = Object.freeze({
  default_format: "PNG",
  default_quality: 95,
  default_output_dir: ".",
});

type WellKnownKey = keyof typeof DEFAULT_CONFIG;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

const configFileSchema = z.record(z.string(), jsonValueSchema);

const qualitySchema = z.number().int().min(1).max(100);

const wellKnownSchemas: Record<WellKnownKey, z.ZodType<JsonValue>> = {
  default_format: z
    .string()
    .trim()
    .min(1)
    .transform((value) => value.toUpperCase()),
  default_quality: qualitySchema,
  default_output_dir: z.string().min(1),
};

const WELL_KNOWN_KEYS: readonly WellKnownKey[] = [
  "default_format",
  "default_quality",
  "default_output_dir",
];

export function defaultConfigFile(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_ENV_VAR];
  if (override) return expandHome(override);
  return path.join(os.homedir(), ".config", "deskgrab", "config.json");
}

function defaultEntries(): ConfigRecord {
  return { ...DEFAULT_CONFIG };
}

export type HydratedConfig = {
  entries: ConfigRecord;
  recovered: boolean;
  repairedKeys: string[];
};

export function hydrateConfig(text: string): HydratedConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { entries: defaultEntries(), recovered: true, repairedKeys: [] };
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    return { entries: defaultEntries(), recovered: true, repairedKeys: [] };
  }

  const entries: ConfigRecord = {};
  const repairedKeys: string[] = [];
  for (const [key, value] of Object.entries(parsed.data)) {
    entries[key] = value;
  }

  for (const key of WELL_KNOWN_KEYS) {
    if (!Object.hasOwn(entries, key)) {
      entries[key] = DEFAULT_CONFIG[key];
      continue;
    }
    const checked = wellKnownSchemas[key].safeParse(entries[key]);
    if (checked.success) {
      entries[key] = checked.data;
    } else {
      entries[key] = DEFAULT_CONFIG[key];
      repairedKeys.push(key);
    }
  }

  return { entries, recovered: false, repairedKeys };
}

function isMissingFile(error: unknown) {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

type ConfigState = {
  entries: ConfigRecord;
  recovered: boolean;
  repairedKeys: string[];
};

function createConfigState() {
  return createStore<ConfigState>()(
    immer<ConfigState>(() => ({
      entries: defaultEntries(),
      recovered: false,
      repairedKeys: [],
    })),
  );
}

/**
 * Persisted user preferences. Read or parse failures at load time degrade to
 * defaults and leave the file on disk untouched. A missing file is seeded with
 * defaults, so load() can still fail with config_io when that write fails.
 */
export class ConfigStore {
  readonly file: string;
  private readonly state = createConfigState();

  private constructor(file: string) {
    this.file = file;
  }

  static async load(file: string = defaultConfigFile()): Promise<ConfigStore> {
    const store = new ConfigStore(file);
    await store.load();
    return store;
  }

  async load(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.file, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.replace({ entries: defaultEntries(), recovered: false, repairedKeys: [] });
        await this.save();
        return;
      }
      this.replace({ entries: defaultEntries(), recovered: true, repairedKeys: [] });
      return;
    }
    this.replace(hydrateConfig(text));
  }

  private replace(next: HydratedConfig) {
    this.state.setState(next, true);
  }

  async save(): Promise<void> {
    try {
      await mkdir(path.dirname(this.file), { recursive: true });
      await writeFile(this.file, `${JSON.stringify(this.entries(), null, 2)}\n`, "utf8");
    } catch (error) {
      throw new CaptureError("config_io", `Failed to save configuration: ${describeError(error)}`, {
        operation: "saveConfig",
        cause: error,
      });
    }
  }

  async reset(): Promise<void> {
    this.replace({ entries: defaultEntries(), recovered: false, repairedKeys: [] });
    await this.save();
  }

  get recovered(): boolean {
    return this.state.getState().recovered;
  }

  get repairedKeys(): readonly string[] {
    return this.state.getState().repairedKeys;
  }

  entries(): Readonly<ConfigRecord> {
    return this.state.getState().entries;
  }

  get(key: string): JsonValue | undefined;
  get(key: string, fallback: JsonValue): JsonValue;
  get(key: string, fallback?: JsonValue): JsonValue | undefined {
    const entries = this.entries();
    return Object.hasOwn(entries, key) ? entries[key] : fallback;
  }

  set(key: string, value: JsonValue): void {
    this.state.setState((draft) => {
      draft.entries[key] = castDraft(value);
    });
  }

  get defaultFormat(): string {
    const value = this.get("default_format");
    return typeof value === "string" ? value : DEFAULT_CONFIG.default_format;
  }

  setDefaultFormat(value: string): void {
    this.set("default_format", value.toUpperCase());
  }

  get defaultQuality(): number {
    const checked = qualitySchema.safeParse(this.get("default_quality"));
    return checked.success ? checked.data : DEFAULT_CONFIG.default_quality;
  }

  setDefaultQuality(value: number): void {
    if (!qualitySchema.safeParse(value).success) {
      throw new RangeError("Quality must be between 1 and 100");
    }
    this.set("default_quality", value);
  }

  get defaultOutputDir(): string {
    const value = this.get("default_output_dir");
    return expandHome(typeof value === "string" ? value : DEFAULT_CONFIG.default_output_dir);
  }

  setDefaultOutputDir(value: string): void {
    this.set("default_output_dir", value);
  }

  toString(): string {
    return `Config(${JSON.stringify(this.entries())})`;
  }
}
