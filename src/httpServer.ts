import express from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { loadConfig } from "./config.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createTimerServer, createTimerServices, type TimerServices } from "./server.js";
import { ListStore } from "./state/listStore.js";
import { ListFileStorage } from "./state/listStorage.js";

const log = createLogger("http");

interface McpSession {
  transport: StreamableHTTPServerTransport;
  detach: () => void;
}

async function bootstrap() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const storage = new ListFileStorage(config.dataFile);
  const store = new ListStore({
    initialLists: await storage.load(),
    onChange: lists => storage.save(lists)
  });
  const services = createTimerServices(store, {
    heartbeatMs: config.heartbeatMs,
    autoplay: config.autoplay
  });

  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const sessions = new Map<string, McpSession>();

  const forget = (sessionId: string | undefined) => {
    if (!sessionId) {
      return;
    }
    sessions.get(sessionId)?.detach();
    sessions.delete(sessionId);
  };

  const openSession = async (shared: TimerServices) => {
    const { server, detach } = createTimerServer(shared);
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        sessions.set(sessionId, { transport, detach });
      },
      onsessionclosed: sessionId => forget(sessionId)
    });
    transport.onclose = () => {
      detach();
      forget(transport.sessionId);
    };
    await server.connect(transport);
    return transport;
  };

  const failure = (res: Response, message: string) => {
    if (!res.headersSent) {
      res.status(500).json({ error: "internal_error", message });
    }
  };

  const lookup = (req: Request, res: Response, missingMessage: string): StreamableHTTPServerTransport | undefined => {
    const sessionId = req.header("mcp-session-id");
    if (!sessionId) {
      res.status(400).json({ error: "missing_session", message: missingMessage });
      return undefined;
    }
    const session = sessions.get(sessionId);
    if (!session) {
      res.status(404).json({
        error: "unknown_session",
        message: "Session not found. Start a new session to initialize."
      });
      return undefined;
    }
    return session.transport;
  };

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      if (req.header("mcp-session-id")) {
        const existing = lookup(req, res, "");
        if (existing) {
          await existing.handleRequest(req, res, req.body);
        }
        return;
      }
      const transport = await openSession(services);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error("Error handling MCP POST request", error);
      failure(res, "The timer server encountered an unexpected error.");
    }
  });

  app.get("/mcp", async (req: Request, res: Response) => {
    const transport = lookup(req, res, "Provide an MCP-Session-Id header to resume streaming.");
    if (!transport) {
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      log.error("Error handling MCP GET stream", error);
      failure(res, "Failed to stream MCP updates.");
    }
  });

  app.delete("/mcp", async (req: Request, res: Response) => {
    const transport = lookup(req, res, "Provide an MCP-Session-Id header to close a session.");
    if (!transport) {
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      log.error("Error handling MCP DELETE request", error);
      failure(res, "Failed to close MCP session.");
    } finally {
      forget(transport.sessionId);
    }
  });

  const serverInstance = app.listen(config.port, () => {
    log.info(`Timer sequencer MCP server listening on port ${config.port}`);
  });

  const shutdown = async () => {
    log.info("Shutting down timer sequencer server...");
    services.toolset.closeSession();
    serverInstance.close();
    await Promise.all(
      [...sessions.values()].map(async ({ transport }) => {
        try {
          await transport.close();
        } catch (error) {
          log.error("Error closing transport", error);
        }
      })
    );
    await store.waitForPersistence();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch(error => {
      log.error("Error during shutdown", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

bootstrap().catch(error => {
  log.error("Failed to start timer sequencer server", error);
  process.exit(1);
});
