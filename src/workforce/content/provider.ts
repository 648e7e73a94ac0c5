import {
  createMessageCompletionClient,
  type MessageCompletionClient,
} from "../../infra/llm-messages.js";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { describeError } from "../errors.js";
import { EMAIL_SYSTEM_PROMPT, buildMessagePrompt } from "./prompts.js";

const log = createSubsystemLogger("workforce/content");

const SUBJECT_PREFIXES = ["Subject:", "subject:", "RE:", "Re:"] as const;

export type GeneratedMessage = {
  subject: string;
  body: string;
};

/**
 * Resolves the text of a simulated message. Implementations never reject.
 */
export interface ContentProvider {
  readonly kind: "template" | "llm";
  generate(department: string, workerName: string): Promise<GeneratedMessage>;
}

type MessageTemplate = (workerName: string) => GeneratedMessage;

const DEPARTMENT_TEMPLATES: Record<string, readonly MessageTemplate[]> = {
  engineering: [
    (name) => ({
      subject: "Sprint Update",
      body: `Hi team,\n\nJust a quick update on the current sprint. We're on track with the planned deliverables.\n\nBest,\n${name}`,
    }),
    (name) => ({
      subject: "Code Review Request",
      body: `Hi,\n\nCould you take a look at my latest PR when you get a chance? It addresses the performance issue we discussed.\n\nThanks,\n${name}`,
    }),
  ],
  sales: [
    (name) => ({
      subject: "Client Follow-up",
      body: `Hi team,\n\nFollowing up on today's client call. They're interested in moving forward with the proposal.\n\nBest,\n${name}`,
    }),
    (name) => ({
      subject: "Pipeline Update",
      body: `Hi,\n\nQuick update on the Q4 pipeline - we're tracking well against targets.\n\nRegards,\n${name}`,
    }),
  ],
};

const GENERIC_TEMPLATES: readonly MessageTemplate[] = [
  (name) => ({
    subject: "Work Update",
    body: `Hi,\n\nSharing a quick update on current priorities.\n\nBest,\n${name}`,
  }),
];

export class TemplateContentProvider implements ContentProvider {
  readonly kind = "template" as const;
  private counter = 0;

  async generate(department: string, workerName: string): Promise<GeneratedMessage> {
    return this.next(department, workerName);
  }

  /** Synchronous form used by the LLM provider's fallback path. */
  next(department: string, workerName: string): GeneratedMessage {
    this.counter += 1;
    const templates = DEPARTMENT_TEMPLATES[department.toLowerCase()] ?? GENERIC_TEMPLATES;
    return templates[this.counter % templates.length](workerName);
  }
}

export function parseGeneratedMessage(content: string, workerName: string): GeneratedMessage {
  const trimmed = content.trim();
  const breakIndex = trimmed.indexOf("\n");
  if (breakIndex === -1) {
    return { subject: `Update from ${workerName}`, body: trimmed };
  }
  let subject = trimmed.slice(0, breakIndex).trim();
  for (const prefix of SUBJECT_PREFIXES) {
    if (subject.startsWith(prefix)) {
      subject = subject.slice(prefix.length).trim();
    }
  }
  return { subject, body: trimmed.slice(breakIndex + 1).trim() };
}

export class LlmContentProvider implements ContentProvider {
  readonly kind = "llm" as const;

  constructor(
    private readonly client: MessageCompletionClient,
    private readonly fallback: TemplateContentProvider,
    private readonly directive: string | null = null,
  ) {}

  async generate(department: string, workerName: string): Promise<GeneratedMessage> {
    try {
      const text = await this.client.complete({
        system: EMAIL_SYSTEM_PROMPT,
        prompt: buildMessagePrompt(department, workerName, this.directive),
        maxTokens: 500,
        temperature: 0.8,
      });
      return parseGeneratedMessage(text, workerName);
    } catch (err) {
      log.warn(
        { department, workerName, error: describeError(err) },
        "LLM generation failed, using template",
      );
      return this.fallback.next(department, workerName);
    }
  }
}

export type CreateContentProviderOptions = {
  enableAi: boolean;
  directive?: string | null;
  client?: MessageCompletionClient | null;
  env?: NodeJS.ProcessEnv;
};

export function createContentProvider(options: CreateContentProviderOptions): ContentProvider {
  const templates = new TemplateContentProvider();
  if (!options.enableAi) {
    return templates;
  }
  const client =
    options.client === undefined
      ? createMessageCompletionClient({ env: options.env })
      : options.client;
  if (!client) {
    log.warn("AI generation requested but no LLM API key is configured; using templates");
    return templates;
  }
  log.info("AI message generation enabled");
  return new LlmContentProvider(client, templates, options.directive ?? null);
}
