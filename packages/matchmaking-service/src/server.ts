// src/server.ts
import express, { Express, ErrorRequestHandler } from "express";
import { createApiRouter, sendError } from "./api-routes.js";
import { loadConfig } from "./config.js";
import { db } from "./database.js";
import { AppError, ValidationError } from "./errors.js";
import { MatchmakingService } from "./matchmaking.js";

// 4xx status carried by body-parser's http-errors (oversized body, bad charset, aborted request)
const clientErrorStatus = (err: unknown): number | undefined => {
  if (typeof err !== "object" || err === null) return undefined;
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
};

// Body rejections from express.json() surface here
const bodyErrorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof SyntaxError) {
    sendError(res, new ValidationError("Malformed JSON body"));
    return;
  }
  const status = clientErrorStatus(err);
  if (status !== undefined) {
    sendError(res, new AppError(err instanceof Error ? err.message : "Invalid request body", status));
    return;
  }
  sendError(res, err);
};

export const createApp = (service: MatchmakingService): Express => {
  const app = express();

  app.use(express.json());
  app.use("/api", createApiRouter(service));

  app.get("/", (req, res) => {
    res.json({ message: "FindRivals API running" });
  });

  app.get("/health", (req, res) => {
    res.status(200).send("OK");
  });

  app.use(bodyErrorHandler);

  return app;
};

export const startServer = () => {
  try {
    const { port } = loadConfig();
    const app = createApp(new MatchmakingService(db.instance));

    app.listen(port, () => {
      console.log(`Server is running on http://localhost:${port}`);
      console.log(`API endpoints:`);
      console.log(`  POST   /api/teams - Register a team`);
      console.log(`  GET    /api/teams?sport=... - List teams`);
      console.log(`  GET    /api/teams/:teamId - Get a team`);
      console.log(`  POST   /api/matchposts - Post a match request`);
      console.log(`  GET    /api/feed?sport=... - Match feed, newest first`);
      console.log(`  GET    /api/nearby?sport=...&centerLat=...&centerLon=...&radiusKm=... - Nearby opponents`);
      console.log(`  POST   /api/chat - Send a message`);
      console.log(`  GET    /api/chat/:teamA/:teamB - Conversation between two teams`);
      console.log(`  GET    /api/admin/stats - Totals`);
      console.log(`  DELETE /api/admin/teams/:teamId - Delete a team`);
      console.log(`  GET    /api/health - Health check`);
    });

    // Graceful shutdown
    process.on('SIGINT', () => {
      console.log('\nShutting down gracefully...');
      db.close();
      process.exit(0);
    });

    process.on('SIGTERM', () => {
      console.log('\nShutting down gracefully...');
      db.close();
      process.exit(0);
    });

  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};
