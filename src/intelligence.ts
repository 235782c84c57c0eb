// Crisis Relay - Intelligence backend
// Chat completions against any OpenAI-compatible endpoint. Replies carry
// inline control tokens; parsing them is the crisis mode machine's job.

import type { ConversationEntry, CrisisMode, LocationReading } from "./types.js";
import { buildCompanionPrompt, buildContactPrompt } from "./prompts.js";

// ─── Collaborator contract ──────────────────────────────────────────────────────

export type Persona =
  | { kind: "companion"; userName: string; safeWord: string }
  | { kind: "contact"; userName: string; contactName: string; location: LocationReading };

export interface IntelligenceRequest {
  transcript: string;
  mode: CrisisMode;
  /** Earlier log entries, oldest first. Excludes `transcript` itself. */
  context: readonly ConversationEntry[];
  persona: Persona;
}

export interface IntelligenceBackend {
  /** Resolves to the raw reply, control tokens included. */
  respond(request: IntelligenceRequest, signal?: AbortSignal): Promise<string>;
}

// ─── OpenAI client interface (for testability / dependency injection) ────────────

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * The SDK client satisfies it; tests inject a mock.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: ChatMessage[];
          temperature?: number;
          max_tokens?: number;
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface IntelligenceConfig {
  model: string;
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_INTELLIGENCE_CONFIG: IntelligenceConfig = {
  model: "llama-3.1-8b-instant",
  temperature: 0.35,
  maxTokens: 150,
};

// ─── Backend ────────────────────────────────────────────────────────────────────

export class OpenAIIntelligenceBackend implements IntelligenceBackend {
  private readonly client: ChatCompletionClient;
  private readonly config: IntelligenceConfig;

  constructor(client: ChatCompletionClient, config: Partial<IntelligenceConfig> = {}) {
    this.client = client;
    this.config = { ...DEFAULT_INTELLIGENCE_CONFIG, ...config };
  }

  async respond(request: IntelligenceRequest, signal?: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: buildMessages(request),
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      },
      { signal },
    );

    const content = completion.choices[0]?.message.content;
    if (content === null || content === undefined || content.trim().length === 0) {
      throw new Error("Intelligence backend returned an empty reply");
    }
    return content;
  }
}

export function buildMessages(request: IntelligenceRequest): ChatMessage[] {
  const { persona, mode, context, transcript } = request;

  const system =
    persona.kind === "companion"
      ? buildCompanionPrompt({ userName: persona.userName, safeWord: persona.safeWord, mode })
      : buildContactPrompt({
          userName: persona.userName,
          contactName: persona.contactName,
          mode,
          location: persona.location,
          recent: context.filter((entry) => entry.channel !== "bridge"),
        });

  const messages: ChatMessage[] = [{ role: "system", content: system }];

  // A contact call gets the user's conversation in its system prompt; the
  // chat turns are the contact's own questions and the answers to them.
  const turns =
    persona.kind === "companion"
      ? context.filter((entry) => entry.channel !== "bridge")
      : context.filter((entry) => entry.channel === "bridge");

  for (const entry of turns) {
    if (entry.speaker === "assistant") {
      messages.push({ role: "assistant", content: entry.text });
    } else {
      messages.push({ role: "user", content: entry.text });
    }
  }

  messages.push({ role: "user", content: transcript });
  return messages;
}
