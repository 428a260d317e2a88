import express, {
  type Application,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import cors from "cors";
import { createApiRoutes, type ApiRouteDeps } from "./routes/index.js";
import docsRoutes from "./routes/docs.routes.js";
import { API, ERROR_CODES, FRONTEND_URL } from "./config/constants.js";

/**
 * Build the Express app. Tests pass a fake geodata client; the server
 * uses the default Overpass client.
 */
export function createApp(deps: ApiRouteDeps = {}): Application {
  const app: Application = express();

  // Middleware
  app.use(
    cors({
      origin: FRONTEND_URL,
      credentials: true,
    })
  );
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Documentation Routes (mounted before API for /docs prefix)
  app.use("/docs", docsRoutes);

  // API Routes
  app.use(API.PREFIX, createApiRoutes(deps));

  // Health check route
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      message: "Route Surface API is running",
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV,
    });
  });

  // Root route
  app.get("/", (_req: Request, res: Response) => {
    res.json({
      message: "Welcome to Route Surface API",
      version: "1.0.0",
      documentation: "/docs",
      endpoints: {
        health: "/health",
        docs: "/docs",
        openapi: "/docs/openapi.json",
        surface: {
          info: `${API.PREFIX}/surface`,
          analyze: `${API.PREFIX}/surface/analyze`,
        },
      },
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: "Route not found",
      code: ERROR_CODES.NOT_FOUND,
      path: req.path,
    });
  });

  // Error handler (errors passed to next() by middleware)
  app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[Server] Unhandled error:", error);
    res.status(500).json({
      success: false,
      error: "Internal server error",
      code: ERROR_CODES.INTERNAL_ERROR,
    });
  });

  return app;
}
