// src/api-routes.ts
import { Router, Request, Response } from "express";
import { toAppError } from "./errors.js";
import { MatchmakingService } from "./matchmaking.js";
import {
  MatchPostCreateSchema,
  MessageCreateSchema,
  NearbyQuerySchema,
  SportQuerySchema,
  TeamCreateSchema,
} from "./schemas.js";
import { ApiResponse } from "./types.js";

// Helper functions to send API responses
export const sendResponse = <T>(res: Response, data?: T, message?: string) => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
  };
  res.status(200).json(response);
};

export const sendError = (res: Response, error: unknown) => {
  const appError = toAppError(error);
  if (appError.status >= 500) {
    console.error(`Request failed with ${appError.status}:`, error);
  }
  const response: ApiResponse<never> = {
    success: false,
    error: appError.message,
  };
  res.status(appError.status).json(response);
};

export const createApiRouter = (service: MatchmakingService): Router => {
  const router = Router();

  // Middleware to set common headers
  router.use((req, res, next) => {
    res.setHeader("Content-Type", "application/json");
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader(
      "Access-Control-Allow-Methods",
      "GET, POST, DELETE, OPTIONS",
    );
    res.setHeader(
      "Access-Control-Allow-Headers",
      "Origin, X-Requested-With, Content-Type, Accept",
    );
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  // POST /api/teams - Register a team and mint its team id
  router.post("/teams", (req: Request, res: Response) => {
    try {
      const teamData = TeamCreateSchema.parse(req.body ?? {});
      const registration = service.registerTeam(teamData);
      sendResponse(res, registration, "Team registered successfully");
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/teams?sport=... - List teams, optionally for one sport
  router.get("/teams", (req: Request, res: Response) => {
    try {
      const { sport } = SportQuerySchema.parse(req.query);
      sendResponse(res, service.listTeams(sport));
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/teams/:teamId - Get a team by its team id
  router.get("/teams/:teamId", (req: Request, res: Response) => {
    try {
      sendResponse(res, service.getTeam(req.params.teamId));
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/matchposts - Post a match request for a team
  router.post("/matchposts", (req: Request, res: Response) => {
    try {
      const postData = MatchPostCreateSchema.parse(req.body ?? {});
      sendResponse(res, service.createMatchPost(postData), "Match post created successfully");
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/feed?sport=... - Match posts, newest first
  router.get("/feed", (req: Request, res: Response) => {
    try {
      const { sport } = SportQuerySchema.parse(req.query);
      sendResponse(res, service.feed(sport));
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/nearby?sport=...&centerLat=...&centerLon=...&radiusKm=... - Nearby opponents
  router.get("/nearby", (req: Request, res: Response) => {
    try {
      const query = NearbyQuerySchema.parse(req.query);
      sendResponse(res, service.nearbyTeams(query));
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/chat - Send a message between two teams
  router.post("/chat", (req: Request, res: Response) => {
    try {
      const messageData = MessageCreateSchema.parse(req.body ?? {});
      sendResponse(res, service.sendMessage(messageData), "Message sent");
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/chat/:teamA/:teamB - Conversation between two teams, oldest first
  router.get("/chat/:teamA/:teamB", (req: Request, res: Response) => {
    try {
      const { teamA, teamB } = req.params;
      sendResponse(res, service.conversation(teamA, teamB));
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/admin/stats - Team and match post totals
  router.get("/admin/stats", (req: Request, res: Response) => {
    try {
      sendResponse(res, service.stats());
    } catch (error) {
      sendError(res, error);
    }
  });

  // DELETE /api/admin/teams/:teamId - Delete a team
  router.delete("/admin/teams/:teamId", (req: Request, res: Response) => {
    try {
      const result = service.deleteTeam(req.params.teamId);
      sendResponse(res, result, result.deleted ? "Team deleted successfully" : "Team not found");
    } catch (error) {
      sendError(res, error);
    }
  });

  // Health check endpoint
  router.get("/health", (req: Request, res: Response) => {
    sendResponse(res, service.health());
  });

  return router;
};
