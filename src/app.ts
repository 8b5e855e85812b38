import express, { type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import path from "node:path";
import type { HealthInfo } from "./container.js";
import { httpErrorOf } from "./errors.js";
import type { LocalBlobStore } from "./storage/local_blob.store.js";
import { BLOB_ROUTE_PREFIX } from "./storage/local_blob.store.js";
import { assetsRootAbs } from "./utils.js";
import type { WorkflowService } from "./workflow.js";

export type AppOptions = {
  health: HealthInfo;
  /** Serves HMAC-signed blob links when blobs live on this machine. */
  localBlobs?: LocalBlobStore | null;
  /** Directory served under `/fallbacks`; defaults to `assets/fallbacks`. */
  fallbackAssetsDir?: string;
};

function sendError(res: Response, err: unknown): void {
  const { status, body } = httpErrorOf(err);
  if (status >= 500) console.error(`[http] ${body.error.code}: ${body.error.message}`);
  res.status(status).json(body);
}

function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res) => {
    handler(req, res).catch((err: unknown) => sendError(res, err));
  };
}

export function createApp(service: WorkflowService, options: AppOptions) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use("/fallbacks", express.static(options.fallbackAssetsDir ?? path.join(assetsRootAbs(), "fallbacks")));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, ...options.health });
  });

  app.post(
    "/api/sessions",
    route(async (req, res) => {
      const session = await service.createSession(req.body);
      res.status(201).json(session);
    })
  );

  app.get(
    "/api/sessions",
    route(async (req, res) => {
      res.json(await service.listSessions(req.query));
    })
  );

  app.get(
    "/api/sessions/stats",
    route(async (_req, res) => {
      res.json(await service.sessionStatistics());
    })
  );

  app.post(
    "/api/sessions/cleanup",
    route(async (req, res) => {
      res.json(await service.cleanup(req.body));
    })
  );

  app.get(
    "/api/sessions/:sessionId",
    route(async (req, res) => {
      res.json(await service.getSession(req.params.sessionId));
    })
  );

  app.post(
    "/api/sessions/:sessionId/analysis",
    route(async (req, res) => {
      res.json(await service.recordAnalysis(req.params.sessionId, req.body));
    })
  );

  app.post(
    "/api/sessions/:sessionId/names",
    route(async (req, res) => {
      res.json(await service.generateNames(req.params.sessionId));
    })
  );

  app.post(
    "/api/sessions/:sessionId/names/select",
    route(async (req, res) => {
      res.json(await service.selectName(req.params.sessionId, req.body));
    })
  );

  app.post(
    "/api/sessions/:sessionId/fail",
    route(async (req, res) => {
      res.json(await service.failSession(req.params.sessionId, req.body));
    })
  );

  app.post(
    "/api/sessions/:sessionId/report",
    route(async (req, res) => {
      res.json(await service.completeSession(req.params.sessionId));
    })
  );

  app.post(
    "/api/generate",
    route(async (req, res) => {
      res.json(await service.handleGenerate(req.body));
    })
  );

  app.post(
    "/api/select",
    route(async (req, res) => {
      res.json(await service.handleSelect(req.body));
    })
  );

  app.get(
    "/api/sessions/:sessionId/events",
    route(async (req, res) => {
      const sessionId = req.params.sessionId;
      const session = await service.getSession(sessionId);

      res.setHeader("Content-Type", "text/event-stream");
      res.setHeader("Cache-Control", "no-cache");
      res.setHeader("Connection", "keep-alive");

      const send = (type: string, payload: unknown) => {
        res.write(`event: ${type}\n`);
        res.write(`data: ${JSON.stringify(payload)}\n\n`);
      };

      const unsubscribe = service.events.subscribe(sessionId, send);
      send("log", { message: "SSE connected", step: session.currentStep, status: session.status });

      const ping = setInterval(() => {
        res.write("event: ping\n");
        res.write("data: {}\n\n");
      }, 15000);

      req.on("close", () => {
        clearInterval(ping);
        unsubscribe();
        res.end();
      });
    })
  );

  const localBlobs = options.localBlobs;
  if (localBlobs) {
    app.get(
      `${BLOB_ROUTE_PREFIX}/*`,
      route(async (req, res) => {
        const key = req.path.slice(BLOB_ROUTE_PREFIX.length + 1);
        const expires = Number(req.query.expires);
        const signature = typeof req.query.signature === "string" ? req.query.signature : "";
        if (!localBlobs.verifySignedRead(key, expires, signature)) {
          res.status(403).json({ error: { code: "forbidden", message: "invalid or expired link" } });
          return;
        }
        const blob = await localBlobs.get(key);
        if (!blob) {
          res.status(404).json({ error: { code: "not_found", message: "blob not found" } });
          return;
        }
        res.setHeader("Content-Type", blob.contentType);
        res.setHeader("Cache-Control", "private, max-age=300");
        res.send(Buffer.from(blob.bytes));
      })
    );
  }

  return app;
}
