import express from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { loadConfig } from "./config.js";
import { createWorkoutServer } from "./server.js";
import { ConsoleAlarmPlayer } from "./services/alarmPlayer.js";
import { InMemoryNotificationCenter } from "./services/notificationService.js";
import { FileKeyValueStore } from "./state/keyValueStore.js";
import { WorkoutToolset } from "./tools/workoutTool.js";
import { WorkoutController } from "./workoutController.js";

async function bootstrap() {
  const config = loadConfig();
  const notifications = new InMemoryNotificationCenter({ permission: config.notificationPermission });
  const controller = await WorkoutController.create({
    store: new FileKeyValueStore(config.dataFile),
    notifications,
    alarm: new ConsoleAlarmPlayer(),
    tickIntervalMs: config.tickIntervalMs
  });
  const toolset = new WorkoutToolset(controller, () => notifications.pending());

  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const transports = new Map<string, StreamableHTTPServerTransport>();

  const createTransport = () => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        transports.set(sessionId, transport);
      }
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId) {
        transports.delete(sessionId);
      }
    };

    return transport;
  };

  const requireSession = (req: Request, res: Response): StreamableHTTPServerTransport | undefined => {
    const sessionId = req.header("mcp-session-id") ?? undefined;
    if (!sessionId) {
      res.status(400).json({
        error: "missing_session",
        message: "Provide an Mcp-Session-Id header."
      });
      return undefined;
    }
    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(404).json({
        error: "unknown_session",
        message: "Session not found. Start a new session to initialize."
      });
      return undefined;
    }
    return transport;
  };

  const fail = (res: Response, context: string, error: unknown) => {
    console.error(context, error);
    if (!res.headersSent) {
      res.status(500).json({
        error: "internal_error",
        message: "The workout server encountered an unexpected error."
      });
    }
  };

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      if (req.header("mcp-session-id")) {
        const existing = requireSession(req, res);
        if (existing) {
          await existing.handleRequest(req, res, req.body);
        }
        return;
      }

      const transport = createTransport();
      await createWorkoutServer(toolset).connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      fail(res, "Error handling MCP POST request", error);
    }
  });

  app.get("/mcp", async (req: Request, res: Response) => {
    const transport = requireSession(req, res);
    if (!transport) {
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      fail(res, "Error handling MCP GET stream", error);
    }
  });

  app.delete("/mcp", async (req: Request, res: Response) => {
    const transport = requireSession(req, res);
    if (!transport) {
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      fail(res, "Error handling MCP DELETE request", error);
    } finally {
      if (transport.sessionId) {
        transports.delete(transport.sessionId);
      }
    }
  });

  const serverInstance = app.listen(config.port, () => {
    console.log(`Interval workout MCP server listening on port ${config.port}`);
  });

  const shutdown = async () => {
    console.log("Shutting down the interval workout server...");
    controller.dispose();
    serverInstance.close();
    await Promise.all(
      [...transports.values()].map(async transport => {
        try {
          await transport.close();
        } catch (error) {
          console.error("Error closing transport", error);
        }
      })
    );
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

bootstrap().catch(error => {
  console.error("Failed to start the interval workout server", error);
  process.exit(1);
});
