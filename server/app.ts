/**
 * HTTP APPLICATION
 *
 *   GET  /health
 *   POST /prompts
 *   POST /forms/:form/validate
 */

import express, { Router, type NextFunction, type Request, type Response } from "express";
import { appLogger } from "../services/appLogger";
import { buildPrompt, health, validateForm, type HandlerOptions, type HandlerResponse } from "./handlers";

const send = <B>(res: Response, result: HandlerResponse<B>): void => {
  res.status(result.status).json(result.body);
};

export const createRouter = (options: HandlerOptions = {}): Router => {
  const router = Router();

  router.get("/health", (_req, res) => send(res, health()));

  router.post("/prompts", (req, res) => {
    const result = buildPrompt(req.body, options);
    appLogger.info("prompt_request", { status: result.status });
    send(res, result);
  });

  router.post("/forms/:form/validate", (req, res) => {
    const result = validateForm(req.params.form, req.body);
    appLogger.info("form_validation_request", { form: req.params.form, status: result.status });
    send(res, result);
  });

  return router;
};

export const createApp = (options: HandlerOptions = {}) => {
  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(createRouter(options));

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ detail: ["request body must be valid JSON"] });
      return;
    }
    appLogger.error("request_failed", { error: error instanceof Error ? error.message : String(error) });
    next(error);
  });

  return app;
};
