// Crisis Relay - Environment configuration
// Read once at startup. Anything missing or malformed is a ConfigurationError
// so the process refuses to start rather than failing mid-session.

import type { UserProfile } from "./types.js";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_INTELLIGENCE_CONFIG } from "./intelligence.js";

export const APP_NAME = "Crisis Relay";
export const APP_VERSION = "0.1.0";

export interface TwilioConfig {
  accountSid: string;
  authToken: string;
  fromNumber: string;
}

export interface AppConfig {
  port: number;
  deepgramApiKey: string;
  llm: {
    apiKey: string;
    baseURL: string | undefined;
    model: string;
    temperature: number;
    maxTokens: number;
  };
  murfApiKey: string;
  /** Null when telephony is not configured; notifications are then only logged. */
  twilio: TwilioConfig | null;
  publicHost: string | undefined;
  defaultProfile: UserProfile;
  silenceThresholdSeconds: number;
  silenceWatchdogEnabled: boolean;
  countdownSeconds: number;
  safeWord: string;
  collaboratorTimeoutMs: number;
  contextSize: number;
  reportDir: string;
}

export type Env = Readonly<Record<string, string | undefined>>;

// ─── Field readers ──────────────────────────────────────────────────────────────

function optional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function required(env: Env, key: string, problems: string[]): string {
  const value = optional(env, key);
  if (!value) {
    problems.push(`${key} is not set`);
    return "";
  }
  return value;
}

function numberOr(
  env: Env,
  key: string,
  fallback: number,
  problems: string[],
  check: (value: number) => boolean,
  expectation: string,
): number {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    problems.push(`${key} must be ${expectation}, got "${raw}"`);
    return fallback;
  }
  return value;
}

function booleanOr(env: Env, key: string, fallback: boolean, problems: string[]): boolean {
  const raw = optional(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  problems.push(`${key} must be true or false, got "${raw}"`);
  return fallback;
}

const positive = (value: number) => value > 0;
const positiveInteger = (value: number) => Number.isInteger(value) && value > 0;

// ─── Loader ─────────────────────────────────────────────────────────────────────

/**
 * Builds the application config from environment variables.
 * @throws ConfigurationError listing every problem found
 */
export function loadConfig(env: Env): AppConfig {
  const problems: string[] = [];

  const port = numberOr(env, "PORT", 3000, problems, (v) => Number.isInteger(v) && v >= 0 && v < 65536, "a port number");
  const deepgramApiKey = required(env, "DEEPGRAM_API_KEY", problems);
  const llmApiKey = required(env, "LLM_API_KEY", problems);
  const murfApiKey = required(env, "MURF_API_KEY", problems);

  const temperature = numberOr(
    env,
    "LLM_TEMPERATURE",
    DEFAULT_INTELLIGENCE_CONFIG.temperature,
    problems,
    (v) => v >= 0 && v <= 2,
    "between 0 and 2",
  );
  const maxTokens = numberOr(
    env,
    "LLM_MAX_TOKENS",
    DEFAULT_INTELLIGENCE_CONFIG.maxTokens,
    problems,
    positiveInteger,
    "a positive integer",
  );

  const sid = optional(env, "TWILIO_ACCOUNT_SID");
  const token = optional(env, "TWILIO_AUTH_TOKEN");
  const from = optional(env, "TWILIO_PHONE_NUMBER");
  let twilio: TwilioConfig | null = null;
  if (sid && token && from) {
    twilio = { accountSid: sid, authToken: token, fromNumber: from };
  } else if (sid || token || from) {
    problems.push("TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN and TWILIO_PHONE_NUMBER must be set together");
  }

  const contactName = optional(env, "EMERGENCY_CONTACT_NAME");
  const contactNumber = optional(env, "EMERGENCY_CONTACT_NUMBER");
  if (Boolean(contactName) !== Boolean(contactNumber)) {
    problems.push("EMERGENCY_CONTACT_NAME and EMERGENCY_CONTACT_NUMBER must be set together");
  }
  const defaultProfile: UserProfile = {
    name: optional(env, "USER_NAME") ?? "the user",
    contacts: contactName && contactNumber ? [{ name: contactName, phone: contactNumber }] : [],
  };

  const config: AppConfig = {
    port,
    deepgramApiKey,
    llm: {
      apiKey: llmApiKey,
      baseURL: optional(env, "LLM_BASE_URL"),
      model: optional(env, "LLM_MODEL") ?? DEFAULT_INTELLIGENCE_CONFIG.model,
      temperature,
      maxTokens,
    },
    murfApiKey,
    twilio,
    publicHost: optional(env, "PUBLIC_HOST"),
    defaultProfile,
    silenceThresholdSeconds: numberOr(env, "SILENCE_THRESHOLD_SECONDS", 10, problems, positive, "a positive number"),
    silenceWatchdogEnabled: booleanOr(env, "SILENCE_WATCHDOG_ENABLED", true, problems),
    countdownSeconds: numberOr(env, "COUNTDOWN_SECONDS", 5, problems, positive, "a positive number"),
    safeWord: optional(env, "SAFE_WORD") ?? "blueberries",
    collaboratorTimeoutMs: numberOr(env, "COLLABORATOR_TIMEOUT_MS", 8000, problems, positiveInteger, "a positive integer"),
    contextSize: numberOr(env, "CONVERSATION_CONTEXT_SIZE", 30, problems, positiveInteger, "a positive integer"),
    reportDir: optional(env, "REPORT_DIR") ?? "output/reports",
  };

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
  }
  return config;
}
