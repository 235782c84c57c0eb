// Crisis Relay - Entry point
// Wires up all collaborators and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import twilio from "twilio";
import { APP_NAME, APP_VERSION, loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { DeepgramSpeechToText } from "./speech-to-text.js";
import { OpenAIIntelligenceBackend } from "./intelligence.js";
import type { ChatCompletionClient } from "./intelligence.js";
import { MurfSynthesisEngine } from "./synthesis.js";
import { LoggingTelephony, TwilioTelephony } from "./telephony.js";
import type { Telephony } from "./telephony.js";
import { EvidenceVault } from "./evidence-vault.js";
import { VoiceProfileTable } from "./voice-profiles.js";
import { ControlTokenVocabulary } from "./control-tokens.js";
import { describeError } from "./errors.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
let profiles: VoiceProfileTable;
try {
  config = loadConfig(process.env);
  // An incomplete profile table is caught here, never mid-session
  profiles = new VoiceProfileTable();
} catch (err) {
  logFatal(describeError(err));
  process.exit(1);
}

const vocabulary = ControlTokenVocabulary.fromProfileTable(profiles);
logInit(`Configuration loaded; control vocabulary covers ${profiles.modes.length} modes`);

// ─── Initialize API clients ─────────────────────────────────────────────────────

logInit("Creating Deepgram client...");
const deepgramClient = createDeepgramClient(config.deepgramApiKey);

logInit(`Creating chat client (${config.llm.baseURL ?? "OpenAI"})...`);
const openaiClient = new OpenAI({ apiKey: config.llm.apiKey, baseURL: config.llm.baseURL });
const chatClient: ChatCompletionClient = {
  chat: {
    completions: {
      create: (params, options) => openaiClient.chat.completions.create({ ...params, stream: false }, options),
    },
  },
};

let telephony: Telephony;
if (config.twilio) {
  logInit("Creating Twilio client...");
  telephony = new TwilioTelephony(twilio(config.twilio.accountSid, config.twilio.authToken), {
    from: config.twilio.fromNumber,
    publicHost: config.publicHost,
  });
} else {
  logInit("Twilio not configured; notifications and calls will only be logged");
  telephony = new LoggingTelephony();
}

if (config.defaultProfile.contacts.length === 0) {
  logInit("No default emergency contact; clients must send a user_profile");
}

// ─── Create SessionManager with all dependencies ────────────────────────────────

logInit("Wiring SessionManager pipeline...");
const sessionManager = new SessionManager({
  speechToText: new DeepgramSpeechToText(deepgramClient),
  intelligence: new OpenAIIntelligenceBackend(chatClient, {
    model: config.llm.model,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
  }),
  synthesis: new MurfSynthesisEngine({ apiKey: config.murfApiKey }),
  telephony,
  reportSink: new EvidenceVault(config.reportDir),
  profiles,
  vocabulary,
  config: {
    timeoutMs: config.collaboratorTimeoutMs,
    contextSize: config.contextSize,
    countdownSeconds: config.countdownSeconds,
    safeWord: config.safeWord,
    watchdog: {
      thresholdSeconds: config.silenceThresholdSeconds,
      enabled: config.silenceWatchdogEnabled,
    },
    defaultProfile: config.defaultProfile,
  },
});

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ sessionManager });

const shutdown = (signal: string) => {
  logInit(`${signal} received, ending sessions...`);
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logFatal(`Shutdown failed: ${describeError(err)}`);
      process.exit(1);
    },
  );
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

server.listen(config.port).then(
  () => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit("Pipeline: Deepgram → chat completions → control tokens → Murf");
    logInit(`Silence watchdog: ${config.silenceWatchdogEnabled ? `${config.silenceThresholdSeconds}s` : "disabled"}`);
    logInit("Ready for connections");
  },
  (err: unknown) => {
    logFatal(`Failed to listen on port ${config.port}: ${describeError(err)}`);
    process.exit(1);
  },
);
