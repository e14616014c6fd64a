import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { z } from "zod";

export interface LLMConfig {
  provider: "ollama" | "openai" | "anthropic" | "openrouter" | "lmstudio" | "custom";
  baseUrl?: string;
  apiKey?: string;
  model?: string;  // Optional, defaults vary by provider
}

export interface CharacterConfig {
  name: string;
  summary?: string;
  relationships?: string[];
}

export type StrengthPresetName = "default" | "conservative" | "aggressive";
export type MemoryStoreKind = "chroma" | "file" | "memory";

export interface Config {
  // Memory persistence
  memory_store: MemoryStoreKind;
  chroma_host: string;
  chroma_port: number;
  chroma_collection: string;
  data_dir: string;  // JSON stores (history, ledger, procedures, file-backed memories)

  // Scorer used by consolidation
  llm?: LLMConfig;

  // Retention model
  strength_preset: StrengthPresetName;

  // Strategy selection
  merge_strategy: "smart" | "simple";
  conflict_resolver: "smart" | "simple";
  strict_contradictions: boolean;  // Entity/tag conflicts need a negated statement, not just overlap

  // Memoization caches
  similarity_cache_size: number;
  similarity_cache_ttl_ms: number;
  resolution_cache_size: number;
  resolution_cache_ttl_ms: number;

  consolidation: {
    batch_delay_ms: number;       // Throttle between scorer calls
    scorer_timeout_ms: number;
    scorer_max_retries: number;
    apply_adaptive_threshold: boolean;  // Use the per-character threshold as the Stage 4 bar
  };

  procedural: {
    learning_rate: number;
    decay_rate: number;
    history_limit: number;
  };

  // Character profiles offered to the scorer as context
  characters: Record<string, CharacterConfig>;
}

/**
 * Zod schema for config validation.
 * Validates user-provided config values; invalid fields fall back to defaults.
 */
const LLMConfigSchema = z.object({
  provider: z.enum(["ollama", "openai", "anthropic", "openrouter", "lmstudio", "custom"]),
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  model: z.string().optional(),
});

const CharacterConfigSchema = z.object({
  name: z.string().min(1),
  summary: z.string().optional(),
  relationships: z.array(z.string()).optional(),
});

export const ConfigSchema = z.object({
  memory_store: z.enum(["chroma", "file", "memory"]),
  chroma_host: z.string().min(1),
  chroma_port: z.number().int().min(1).max(65535),
  chroma_collection: z.string().min(3),
  data_dir: z.string().min(1),
  llm: LLMConfigSchema.optional(),
  strength_preset: z.enum(["default", "conservative", "aggressive"]),
  merge_strategy: z.enum(["smart", "simple"]),
  conflict_resolver: z.enum(["smart", "simple"]),
  strict_contradictions: z.boolean(),
  similarity_cache_size: z.number().int().positive(),
  similarity_cache_ttl_ms: z.number().int().nonnegative(),
  resolution_cache_size: z.number().int().positive(),
  resolution_cache_ttl_ms: z.number().int().nonnegative(),
  consolidation: z.object({
    batch_delay_ms: z.number().int().nonnegative(),
    scorer_timeout_ms: z.number().int().positive(),
    scorer_max_retries: z.number().int().min(0).max(10),
    apply_adaptive_threshold: z.boolean(),
  }),
  procedural: z.object({
    learning_rate: z.number().gt(0).max(1),
    decay_rate: z.number().min(0).max(1),
    history_limit: z.number().int().positive(),
  }),
  characters: z.record(CharacterConfigSchema),
});

export const CONFIG_DIR = process.env.MEMORY_LIFECYCLE_HOME || join(homedir(), ".memory-lifecycle");
export const CONFIG_PATH = join(CONFIG_DIR, "config.json");

export const DEFAULT_CONFIG: Config = {
  memory_store: "chroma",
  chroma_host: "localhost",
  chroma_port: 8000,
  chroma_collection: "lifecycle_memories",
  data_dir: join(CONFIG_DIR, "data"),
  strength_preset: "default",
  merge_strategy: "smart",
  conflict_resolver: "smart",
  strict_contradictions: false,
  similarity_cache_size: 1000,
  similarity_cache_ttl_ms: 60 * 60 * 1000,
  resolution_cache_size: 500,
  resolution_cache_ttl_ms: 60 * 60 * 1000,
  consolidation: {
    batch_delay_ms: 100,
    scorer_timeout_ms: 30_000,
    scorer_max_retries: 2,
    apply_adaptive_threshold: false,
  },
  procedural: {
    learning_rate: 0.05,
    decay_rate: 0.01,
    history_limit: 100,
  },
  characters: {},
};

/**
 * Merge raw user config over the defaults, keeping only the fields that validate.
 */
export function resolveConfig(raw: unknown): Config {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    console.error("Config file is not a JSON object, using defaults");
    return DEFAULT_CONFIG;
  }

  const entries = Object.entries(raw);
  const merged = { ...DEFAULT_CONFIG, ...Object.fromEntries(entries) };
  const result = ConfigSchema.safeParse(merged);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .map((i) => `  ${i.path.join(".")}: ${i.message}`)
    .join("\n");
  console.error(`Config validation warnings (using defaults for invalid fields):\n${issues}`);

  // Re-merge one field at a time so a single bad value doesn't discard the rest
  let config: Config = DEFAULT_CONFIG;
  for (const [key, value] of entries) {
    const fieldResult = ConfigSchema.safeParse({ ...config, [key]: value });
    if (fieldResult.success) {
      config = fieldResult.data;
    }
  }
  return config;
}

export function loadConfig(): Config {
  try {
    if (existsSync(CONFIG_PATH)) {
      const content = readFileSync(CONFIG_PATH, "utf-8");
      const raw: unknown = JSON.parse(content);
      return resolveConfig(raw);
    }
  } catch (error) {
    console.error("Error loading config, using defaults:", error);
  }
  return DEFAULT_CONFIG;
}

export function saveConfig(config: Config): void {
  try {
    if (!existsSync(CONFIG_DIR)) {
      mkdirSync(CONFIG_DIR, { recursive: true });
    }
    writeFileSync(CONFIG_PATH, JSON.stringify(config, null, 2));
  } catch (error) {
    console.error("Error saving config:", error);
  }
}

export const config = loadConfig();
