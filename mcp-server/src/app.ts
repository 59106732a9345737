import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ResponseComposer } from "./compose/composer.js";
import { loadEngineConfig, type RuntimeSettings } from "./core/config.js";
import { NavigationEngine } from "./core/engine.js";
import { OpenAIDecisionGenerator } from "./core/generative.js";
import { KeywordExampleRetriever } from "./retrieval/examples.js";
import {
  RunTurnArgsZod,
  SessionRefArgsZod,
  SessionService,
  StartSessionArgsZod,
  type ServiceError,
} from "./handlers/run_turn.js";
import { LexiconTextClassifier } from "./signals/classifier.js";
import { createSessionStore } from "./store/session_store.js";

/** Wires the default collaborators from runtime settings. */
export function createSessionService(settings: RuntimeSettings): SessionService {
  const { config } = loadEngineConfig();
  const generator = settings.generativeFallbackEnabled ? new OpenAIDecisionGenerator({ model: settings.model }) : null;
  return new SessionService({
    engine: new NavigationEngine({ generator, config }),
    composer: new ResponseComposer({ config }),
    classifier: new LexiconTextClassifier(),
    retriever: new KeywordExampleRetriever(),
    store: createSessionStore(settings.sessionStore, {
      dir: settings.sessionStoreDir,
      ttlSeconds: settings.sessionTtlSeconds,
    }),
    turnLog: { enabled: settings.turnLogEnabled },
  });
}

type ServiceResult = ({ ok: true; text?: string } & Record<string, unknown>) | ServiceError;

function toolResult(result: ServiceResult) {
  const text = result.ok ? String(result.text ?? "") : `${result.error.type}: ${result.error.message}`;
  return {
    content: [{ type: "text" as const, text }],
    structuredContent: result,
    ...(result.ok ? {} : { isError: true }),
  };
}

const TOOL_ANNOTATIONS = {
  readOnlyHint: false,
  openWorldHint: false,
  destructiveHint: false,
};

export function createSessionMcpServer(service: SessionService, version: string): McpServer {
  const server = new McpServer(
    {
      name: "somatic-navigator",
      version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.registerTool(
    "start_session",
    {
      title: "Start a guided session",
      description:
        "Opens a new guided session and returns the opening question. Pass session_id to choose the id; otherwise one is generated.",
      inputSchema: StartSessionArgsZod,
      annotations: TOOL_ANNOTATIONS,
    },
    async (args) => toolResult(await service.startSession(args))
  );

  server.registerTool(
    "run_turn",
    {
      title: "Run one conversation turn",
      description:
        "Sends the user's message for an open session. Returns the navigation decision, the reply text, related examples and the updated progress.",
      inputSchema: RunTurnArgsZod,
      annotations: TOOL_ANNOTATIONS,
    },
    async (args) => toolResult(await service.runTurn(args))
  );

  server.registerTool(
    "session_status",
    {
      title: "Session progress",
      description: "Returns the substate, completed criteria and counters of a session without changing it.",
      inputSchema: SessionRefArgsZod,
      annotations: { ...TOOL_ANNOTATIONS, readOnlyHint: true },
    },
    async (args) => toolResult(await service.getSessionStatus(args))
  );

  server.registerTool(
    "end_session",
    {
      title: "End a session",
      description: "Closes the session's turn log and removes the session from the store.",
      inputSchema: SessionRefArgsZod,
      annotations: { ...TOOL_ANNOTATIONS, destructiveHint: true },
    },
    async (args) => toolResult(await service.endSession(args))
  );

  return server;
}
