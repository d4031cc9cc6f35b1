import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import "dotenv/config";
import { z } from "zod";
import { Agent, createAgent } from "./agent.js";
import { loadConfig } from "./config/env.js";
import { errorMessage } from "./domain/errors.js";
import { handleRestRequest, readJsonBody, RestApiDeps, writeJson } from "./http/restApi.js";
import { registerAnswerQuestionTool } from "./tools/answerQuestion.js";
import { registerAnswerWithImageTool } from "./tools/answerWithImage.js";
import { registerRouteQueryTool } from "./tools/routeQuery.js";
import { createComponentLogger, createLogger, type Logger } from "./utils/logger.js";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

type SessionMap = Record<string, SessionEntry>;

const MCP_PATH = "/mcp";

const SERVER_NAME = "adaptive-answer-agent";
const SERVER_VERSION = "0.1.0";

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
  const agent = createAgent(config, logger);
  const shutdownTasks: Array<() => Promise<void>> = [agent.close];

  // The server answers (and reports 503 on /healthz) while the index loads.
  void agent.index.initialize().catch((error: unknown) => {
    logger.error({ reason: errorMessage(error) }, "index.unavailable");
  });

  if (config.transport === "http") {
    const stopHttpServer = await runHttpServer(
      config.host,
      config.port,
      () => createAppServer(agent),
      {
        orchestrator: agent.orchestrator,
        router: agent.router,
        imageAnswerer: agent.imageAnswerer,
        indexHealth: () => agent.index.health(),
        logger: createComponentLogger(logger, "http"),
      },
      logger,
    );
    shutdownTasks.unshift(stopHttpServer);
    logger.info({ url: `http://${config.host}:${config.port}${MCP_PATH}` }, "server.listening");
  } else {
    await runStdioServer(createAppServer(agent));
    logger.info("server.stdio_connected");
  }

  const shutdown = async () => {
    try {
      for (const task of shutdownTasks) {
        await task();
      }
    } catch (error) {
      logger.error({ err: error }, "server.shutdown_failed");
      process.exit(1);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

function createAppServer(agent: Agent): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns server status and local index readiness.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      const health = { ...agent.index.health(), storage: await agent.knowledgeBase.getStorageInfo() };
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running. hello ${who}\n${JSON.stringify(health, null, 2)}`,
          },
        ],
      };
    },
  );

  registerAnswerQuestionTool(server, agent.orchestrator);
  registerRouteQueryTool(server, agent.router);
  registerAnswerWithImageTool(server, agent.imageAnswerer);

  return server;
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

async function runHttpServer(
  host: string,
  port: number,
  serverFactory: () => McpServer,
  restDeps: RestApiDeps,
  logger: Logger,
): Promise<() => Promise<void>> {
  const sessions: SessionMap = {};

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (await handleRestRequest(req, res, url.pathname, restDeps)) {
        return;
      }

      if (url.pathname !== MCP_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method === "POST") {
        const body = await readJsonBody(req);
        await handleMcpPost(req, res, body, sessions, serverFactory);
        return;
      }

      if (req.method === "GET" || req.method === "DELETE") {
        await handleSessionRequest(req, res, sessions);
        return;
      }

      writeJson(res, 405, { error: "Method not allowed" });
    } catch (error) {
      logger.error({ err: error, path: req.url }, "http.request_failed");
      if (!res.headersSent) {
        writeJson(res, 500, { error: errorMessage(error) });
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.listen(port, host, () => resolve());
    httpServer.once("error", reject);
  });

  return async () => {
    await Promise.all(
      Object.values(sessions).map(async (entry) => {
        await entry.transport.close();
        await entry.server.close();
      }),
    );

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: SessionMap,
  serverFactory: () => McpServer,
) {
  const sessionId = getSessionId(req);
  const existing = sessionId ? sessions[sessionId] : null;

  if (existing) {
    await existing.transport.handleRequest(req, res, body);
    return;
  }

  if (sessionId && !existing) {
    writeJsonRpcError(res, 404, -32001, "Session not found");
    return;
  }

  if (!isInitializeRequest(body)) {
    writeJsonRpcError(
      res,
      400,
      -32000,
      "Initialize request is required when session is not established",
    );
    return;
  }

  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (newSessionId) => {
      sessions[newSessionId] = { server, transport };
    },
  });

  transport.onclose = () => {
    const closedSessionId = transport.sessionId;
    if (!closedSessionId) {
      return;
    }

    const entry = sessions[closedSessionId];
    if (!entry) {
      return;
    }

    delete sessions[closedSessionId];
    void entry.server.close();
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function handleSessionRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: SessionMap,
) {
  const sessionId = getSessionId(req);
  const entry = sessionId ? sessions[sessionId] : undefined;
  if (!entry) {
    res.writeHead(400, { "Content-Type": "text/plain" });
    res.end("Missing or invalid mcp-session-id");
    return;
  }

  await entry.transport.handleRequest(req, res);
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function writeJsonRpcError(
  res: ServerResponse,
  httpCode: number,
  code: number,
  message: string,
) {
  writeJson(res, httpCode, {
    jsonrpc: "2.0",
    error: { code, message },
    id: null,
  });
}

main().catch((error: unknown) => {
  process.stderr.write(`Failed to start server: ${errorMessage(error)}\n`);
  process.exit(1);
});
