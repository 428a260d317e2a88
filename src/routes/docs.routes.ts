/**
 * Documentation Routes
 * - API Reference via Swagger UI (/docs)
 * - Raw OpenAPI document (/docs/openapi.json)
 */

import { Router, type Request, type Response } from "express";
import swaggerUi from "swagger-ui-express";
import { swaggerSpec } from "../config/swagger.js";

const router = Router();

/**
 * GET /docs/openapi.json
 * OpenAPI document for client generators and tooling
 */
router.get("/openapi.json", (_req: Request, res: Response) => {
  res.json(swaggerSpec);
});

/**
 * GET /docs
 * Swagger UI for interactive API documentation
 */
router.use(
  "/",
  swaggerUi.serve,
  swaggerUi.setup(swaggerSpec, {
    customCss: ".swagger-ui .topbar { display: none; }",
    customSiteTitle: "Route Surface API Reference",
  })
);

export default router;
