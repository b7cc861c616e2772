import express, { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { ChangeRequestBodySchema, RegisterAccessPointSchema } from "./api/schema.js";
import { GuardrailEvaluator } from "./policy/evaluator.js";
import { AccessPointNotFoundError, NetworkStateStore } from "./state/networkStore.js";
import { logger } from "./utils/logger.js";

/** 4xx status carried by errors from the body parser (http-errors style). */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const status: unknown = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export interface AppDeps {
  store: NetworkStateStore;
  evaluator: GuardrailEvaluator;
}

export function createApp({ store, evaluator }: AppDeps) {
  const app = express();
  app.use(express.json());

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, access_points: store.size() });
  });

  app.get("/access-points", (_req, res) => {
    res.json({ access_points: store.list() });
  });

  app.post("/access-points", (req, res) => {
    const body = RegisterAccessPointSchema.parse(req.body);
    const access_point = store.add(body);
    res.status(201).json({ access_point });
  });

  app.get("/access-points/:id", (req, res) => {
    res.json({ access_point: store.get(req.params.id) });
  });

  app.get("/access-points/:id/history", (req, res) => {
    res.json({ history: store.history(req.params.id) });
  });

  app.post("/access-points/:id/change-requests", (req, res) => {
    const body = ChangeRequestBodySchema.parse(req.body);
    const verdict = evaluator.evaluateAndApply(
      req.params.id,
      { new_channel: body.new_channel, new_power_db: body.new_power_db, is_emergency: body.is_emergency },
      body.current_time_minutes,
      body.is_peak_hour,
      { dryRun: body.dry_run }
    );

    if (verdict.accepted) return res.json(verdict);
    return res.status(verdict.kind === "lookup" ? 404 : 409).json(verdict);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      return res.status(400).json({ ok: false, error: "INVALID_BODY", issues: err.issues });
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ ok: false, error: "INVALID_JSON" });
    }
    if (err instanceof AccessPointNotFoundError) {
      return res.status(404).json({ ok: false, error: err.code, id: err.apId });
    }
    const status = clientErrorStatus(err);
    if (status !== null) {
      logger.warn({ err, status }, "Request rejected");
      return res.status(status).json({ ok: false, error: "REQUEST_REJECTED" });
    }
    logger.error({ err }, "Unhandled request error");
    return res.status(500).json({ ok: false, error: "INTERNAL" });
  });

  return app;
}

export function startServer(params: AppDeps & { port: number }) {
  const app = createApp(params);
  const server = app.listen(params.port, () => {
    logger.info({ port: params.port }, "HTTP server listening");
  });
  return server;
}
