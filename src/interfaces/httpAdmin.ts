import express, { type Express, type Request, type Response } from "express";
import { sendError, sendNotFound, sendSuccess } from "./http/responseHelper.js";
import type { StatusResponse } from "./types.js";

interface AdminAppParams {
  getStatus: () => StatusResponse;
}

function setupStatusRoutes(app: Express, params: AdminAppParams) {
  app.get("/admin/status", (_req: Request, res: Response) => {
    try {
      sendSuccess(res, params.getStatus());
    } catch (error) {
      sendError(res, error, "Failed to read status");
    }
  });
}

function setupHealthChecks(app: Express) {
  app.get("/", (_req: Request, res: Response) => {
    res.type("text/plain").send("gRPC service is running. Use a gRPC client to interact with it.");
  });

  app.get("/liveness", (_req: Request, res: Response) => {
    sendSuccess(res, { status: "alive" });
  });
}

export function createAdminApp(params: AdminAppParams): Express {
  const app = express();

  setupStatusRoutes(app, params);
  setupHealthChecks(app);

  app.use((req: Request, res: Response) => {
    sendNotFound(res, `no route for ${req.method} ${req.path}`);
  });

  return app;
}
