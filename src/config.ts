import { readFileSync } from "fs";
import { join } from "path";

import dotenv from "dotenv";

import { logger, setDebugMode } from "./logging/logger.js";

import type { ConversationSettings } from "./conversation/types.js";
import type { GatewayEndpointConfig } from "./types/gateway.js";

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export interface GatewayAppConfig {
  gateway: {
    baseUrl: string;
    verifySsl: boolean;
    timeoutSeconds: number;
  };
  conversation: {
    agentId: string;
    modelOverride: string;
    maxHistory: number;
    systemPrompt: string;
    streaming: boolean;
  };
  logging: {
    debug: boolean;
  };
}

export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful voice assistant. Keep responses brief and natural, they will be spoken aloud. " +
  "Avoid markdown, bullet points, or formatting. Use short sentences.";

export const DEFAULT_CONFIG: GatewayAppConfig = {
  gateway: {
    baseUrl: "http://127.0.0.1:18789",
    verifySsl: true,
    timeoutSeconds: 30,
  },
  conversation: {
    agentId: "main",
    modelOverride: "",
    maxHistory: 10,
    systemPrompt: DEFAULT_SYSTEM_PROMPT,
    streaming: false,
  },
  logging: {
    debug: false,
  },
};

export const TIMEOUT_RANGE_SECONDS = { min: 5, max: 120 } as const;
export const MAX_HISTORY_RANGE = { min: 0, max: 50 } as const;
export const PLACEHOLDER_API_KEY = "YOUR_API_KEY_HERE";

function getEnv(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function coalesceEnv(...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = getEnv(key);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function loadConfigFromFile(directory: string): DeepPartial<GatewayAppConfig> {
  try {
    const configPath = join(directory, "config.json");
    const configFile = readFileSync(configPath, "utf8");
    return JSON.parse(configFile) as DeepPartial<GatewayAppConfig>;
  } catch (error: unknown) {
    logger.warn(
      `[CONFIG] Unable to load config.json (${error instanceof Error ? error.message : "Unknown error"}). Using defaults.`,
    );
    return {};
  }
}

/**
 * Merges a partial (file) configuration over {@link DEFAULT_CONFIG}.
 */
export function resolveConfig(fileConfig: DeepPartial<GatewayAppConfig>): GatewayAppConfig {
  return {
    gateway: {
      baseUrl: fileConfig.gateway?.baseUrl ?? DEFAULT_CONFIG.gateway.baseUrl,
      verifySsl: fileConfig.gateway?.verifySsl ?? DEFAULT_CONFIG.gateway.verifySsl,
      timeoutSeconds: fileConfig.gateway?.timeoutSeconds ?? DEFAULT_CONFIG.gateway.timeoutSeconds,
    },
    conversation: {
      agentId: fileConfig.conversation?.agentId ?? DEFAULT_CONFIG.conversation.agentId,
      modelOverride: fileConfig.conversation?.modelOverride ?? DEFAULT_CONFIG.conversation.modelOverride,
      maxHistory: fileConfig.conversation?.maxHistory ?? DEFAULT_CONFIG.conversation.maxHistory,
      systemPrompt: fileConfig.conversation?.systemPrompt ?? DEFAULT_CONFIG.conversation.systemPrompt,
      streaming: fileConfig.conversation?.streaming ?? DEFAULT_CONFIG.conversation.streaming,
    },
    logging: {
      debug: fileConfig.logging?.debug ?? DEFAULT_CONFIG.logging.debug,
    },
  };
}

export interface LoadedConfig {
  config: GatewayAppConfig;
  /** GATEWAY_API_KEY, or OPENAI_API_KEY; empty when neither is set. */
  apiKey: string;
  /** GATEWAY_BASE_URL when set, otherwise gateway.baseUrl. */
  baseUrl: string;
}

/**
 * Loads `.env` and `config.json` from `directory` and applies the debug flag
 * to the shared logger. Nothing is read until an application calls this.
 */
export function loadConfig(directory: string = process.cwd()): LoadedConfig {
  dotenv.config({ path: join(directory, ".env") });

  // Settings come from config.json (GATEWAY_BASE_URL may override the base
  // URL); secrets only from the environment.
  const config = resolveConfig(loadConfigFromFile(directory));
  setDebugMode(config.logging.debug);

  return {
    config,
    apiKey: coalesceEnv("GATEWAY_API_KEY", "OPENAI_API_KEY") ?? "",
    baseUrl: getEnv("GATEWAY_BASE_URL") ?? config.gateway.baseUrl,
  };
}

/**
 * Collects every problem with the given settings and throws them as one error.
 */
export function validateConfig(appConfig: GatewayAppConfig, apiKey: string, baseUrl: string): void {
  const errors: string[] = [];

  if (baseUrl.trim() === "") {
    errors.push("gateway.baseUrl is required. Configure it in config.json or set GATEWAY_BASE_URL");
  } else if (!/^https?:\/\//i.test(baseUrl)) {
    errors.push(`gateway.baseUrl must start with http:// or https://. Got: ${baseUrl}`);
  }

  if (apiKey === "" || apiKey === PLACEHOLDER_API_KEY) {
    errors.push("GATEWAY_API_KEY is required (set in .env)");
  }

  const { timeoutSeconds } = appConfig.gateway;
  if (
    !Number.isInteger(timeoutSeconds) ||
    timeoutSeconds < TIMEOUT_RANGE_SECONDS.min ||
    timeoutSeconds > TIMEOUT_RANGE_SECONDS.max
  ) {
    errors.push(
      `gateway.timeoutSeconds must be an integer between ${TIMEOUT_RANGE_SECONDS.min} and ${TIMEOUT_RANGE_SECONDS.max}. Got: ${timeoutSeconds}`,
    );
  }

  const { maxHistory } = appConfig.conversation;
  if (!Number.isInteger(maxHistory) || maxHistory < MAX_HISTORY_RANGE.min || maxHistory > MAX_HISTORY_RANGE.max) {
    errors.push(
      `conversation.maxHistory must be an integer between ${MAX_HISTORY_RANGE.min} and ${MAX_HISTORY_RANGE.max}. Got: ${maxHistory}`,
    );
  }

  if (errors.length > 0) {
    const errorMessage = `Configuration validation failed:\n${errors.map((error) => `- ${error}`).join("\n")}`;
    logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  logger.debug("Gateway configuration (config.json):");
  logger.debug(`  Base URL: ${baseUrl}`);
  logger.debug(`  Verify SSL: ${appConfig.gateway.verifySsl}`);
  logger.debug(`  Timeout: ${timeoutSeconds}s`);
  logger.debug(`  Agent: ${appConfig.conversation.agentId}`);
}

export function getEndpointConfig(
  appConfig: GatewayAppConfig,
  apiKey: string,
  baseUrl: string,
): GatewayEndpointConfig {
  return {
    baseUrl,
    apiKey,
    verifySsl: appConfig.gateway.verifySsl,
    timeoutMs: appConfig.gateway.timeoutSeconds * 1000,
  };
}

export function getConversationSettings(appConfig: GatewayAppConfig): ConversationSettings {
  return { ...appConfig.conversation };
}
