import { z } from "zod";
import { describeError } from "./lib/errors";
import { silentLogger, type Logger } from "./lib/logger";

type OpencodeModule = typeof import("@opencode-ai/sdk");
type EmbeddedInstance = Awaited<ReturnType<OpencodeModule["createOpencode"]>>;
type OpencodeClient = EmbeddedInstance["client"];

export interface ModelRef {
  providerID: string;
  modelID: string;
}

/** The three session calls a completion needs, narrowed from the SDK client. */
export interface OpenCodeSessions {
  create(title: string): Promise<unknown>;
  prompt(id: string, model: ModelRef, text: string): Promise<unknown>;
  remove(id: string): Promise<void>;
}

export interface OpenCodeConnection {
  sessions: OpenCodeSessions;
  cleanup?: () => Promise<void>;
}

export interface CompletionClient {
  complete(prompt: string): Promise<string>;
  close(): Promise<void>;
}

export interface CompleterOptions {
  /** `provider/model`; a bare model name is assumed to be an OpenAI model. */
  model: string;
  logger?: Logger;
  connect?: (model: string) => Promise<OpenCodeConnection>;
}

const sessionSchema = z.object({ data: z.object({ id: z.string().min(1) }) });

const partSchema = z.object({ text: z.string().optional(), content: z.string().optional() });

const promptSchema = z.object({
  data: z.object({
    parts: z.array(partSchema).optional(),
    info: z.object({ parts: z.array(partSchema).optional() }).optional()
  })
});

/**
 * Lazily connects to OpenCode on the first request and reuses the connection
 * until `close`. Each completion runs in its own throwaway session.
 */
export function createOpenCodeCompleter(options: CompleterOptions): CompletionClient {
  const logger = options.logger ?? silentLogger;
  const connect = options.connect ?? connectOpenCode;
  const model = parseModel(options.model);
  let connection: Promise<OpenCodeConnection> | null = null;

  const ensureConnection = async (): Promise<OpenCodeConnection> => {
    if (!connection) {
      connection = connect(options.model);
    }
    try {
      return await connection;
    } catch (error) {
      connection = null;
      throw error;
    }
  };

  return {
    async complete(prompt) {
      const { sessions } = await ensureConnection();
      const sessionId = readSessionId(await sessions.create(`morning-briefing-${Date.now()}`));
      try {
        const text = extractText(await sessions.prompt(sessionId, model, prompt));
        if (!text) {
          throw new Error("OpenCode response did not contain text output");
        }
        return text;
      } finally {
        await sessions.remove(sessionId).catch((error: unknown) => {
          logger.debug(`Could not delete OpenCode session ${sessionId}: ${describeError(error)}`);
        });
      }
    },
    async close() {
      if (!connection) {
        return;
      }
      const pending = connection;
      connection = null;
      const settled = await pending.catch(() => null);
      await settled?.cleanup?.();
    }
  };
}

/**
 * Connects to a running server when `OPENCODE_BASE_URL` is set, otherwise
 * starts an embedded one for the configured model.
 */
export async function connectOpenCode(model: string): Promise<OpenCodeConnection> {
  const mod: OpencodeModule = await import("@opencode-ai/sdk");

  if (process.env.OPENCODE_BASE_URL) {
    const client = mod.createOpencodeClient({ baseUrl: process.env.OPENCODE_BASE_URL });
    return { sessions: wrapClient(client) };
  }

  const instance = await mod.createOpencode({ config: { model } });
  return {
    sessions: wrapClient(instance.client),
    cleanup: async () => {
      instance.server.close();
    }
  };
}

function wrapClient(client: OpencodeClient): OpenCodeSessions {
  return {
    create: (title) => client.session.create({ body: { title } }),
    prompt: (id, model, text) =>
      client.session.prompt({
        path: { id },
        body: { model, parts: [{ type: "text", text }] }
      }),
    remove: async (id) => {
      await client.session.delete({ path: { id } });
    }
  };
}

function readSessionId(response: unknown): string {
  const parsed = sessionSchema.safeParse(response);
  if (!parsed.success) {
    throw new Error("OpenCode did not return a session id");
  }
  return parsed.data.data.id;
}

export function extractText(response: unknown): string {
  const parsed = promptSchema.safeParse(response);
  if (!parsed.success) {
    return "";
  }
  const parts = parsed.data.data.parts ?? parsed.data.data.info?.parts ?? [];
  return parts
    .map((part) => part.text ?? part.content ?? "")
    .filter((segment) => segment.length > 0)
    .join("\n")
    .trim();
}

export function parseModel(model: string): ModelRef {
  if (!model.includes("/")) {
    return { providerID: "openai", modelID: model };
  }
  const [providerID, ...rest] = model.split("/");
  return { providerID, modelID: rest.join("/") };
}
