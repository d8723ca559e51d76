import crypto from "node:crypto";
import { once } from "node:events";
import type { IncomingHttpHeaders } from "node:http";
import express, { type NextFunction, type Request, type Response } from "express";
import helmet from "helmet";
import rateLimit from "express-rate-limit";

import { OrchestratorError, errorMessage } from "./tasks/errors.js";
import type { ErrorCode } from "./tasks/errors.js";
import type { TaskOrchestrator } from "./tasks/orchestrator.js";
import {
  ActorSchema,
  CreateTaskSchema,
  JsonValueSchema,
  LeaseSchema,
  OptionalReasonSchema,
  RequiredReasonSchema,
  TaskFilterSchema,
  UpdateTaskSchema,
  WatchFilterSchema,
  parseInput,
} from "./tasks/schemas.js";
import type { Actor } from "./tasks/types.js";

// ---------------------------------------------------------------------------
// Request helpers
// ---------------------------------------------------------------------------
type Body = Record<string, unknown>;

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  ALREADY_CLAIMED: 409,
  VERSION_CONFLICT: 503,
  VALIDATION_ERROR: 400,
  STORE_UNAVAILABLE: 503,
};

export function statusForError(e: unknown): number {
  return e instanceof OrchestratorError ? STATUS_BY_CODE[e.code] : 500;
}

function bodyOf(req: Request): Body {
  const raw: unknown = req.body;
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return {};
  return Object.fromEntries(Object.entries(raw));
}

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const v = headers[name];
  return Array.isArray(v) ? v[0] : v;
}

/** Acting identity from the body's `actor` field, falling back to x-actor-* headers. Not authenticated. */
export function readActor(body: Body, headers: IncomingHttpHeaders): Actor {
  if (body.actor !== undefined) return parseInput(ActorSchema, body.actor);
  return parseInput(ActorSchema, {
    type: header(headers, "x-actor-type"),
    id: header(headers, "x-actor-id"),
    name: header(headers, "x-actor-name") ?? header(headers, "x-actor-id"),
  });
}

function query(req: Request, name: string): string | undefined {
  const v = req.query[name];
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

function queryInt(req: Request, name: string): number | undefined {
  const v = query(req, name);
  return v === undefined ? undefined : Number(v);
}

function optionalLease(value: unknown): number | undefined {
  return value === undefined ? undefined : parseInput(LeaseSchema, value);
}

function sendError(res: Response, e: unknown): void {
  const status = statusForError(e);
  if (status === 500) console.error("[server] unhandled error:", e);
  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(status).json({
    error: {
      code: e instanceof OrchestratorError ? e.code : "INTERNAL",
      message: status === 500 ? "Internal server error" : errorMessage(e),
      retryable: e instanceof OrchestratorError ? e.retryable : false,
    },
  });
}

function route(handler: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response) => {
    handler(req, res).catch((e: unknown) => sendError(res, e));
  };
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------
export interface AppOptions {
  logRequests?: boolean;
}

export function createApp(orchestrator: TaskOrchestrator, opts: AppOptions = {}): express.Express {
  const app = express();
  app.disable("x-powered-by");

  // Security headers
  app.use(helmet());

  // Limit JSON body size
  app.use(express.json({ limit: "256kb" }));

  // Logging (request id + IP), one JSON line per request
  if (opts.logRequests ?? true) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const rid = crypto.randomUUID();
      const xf = (req.headers["x-forwarded-for"] || "").toString();
      const ip = (xf ? xf.split(",")[0].trim() : req.socket.remoteAddress) || "unknown";
      const start = Date.now();
      res.on("finish", () => {
        console.log(
          JSON.stringify({ rid, ip, method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start })
        );
      });
      next();
    });
  }

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: 600,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // -------------------------------------------------------------------------
  // Tasks
  // -------------------------------------------------------------------------
  app.post(
    "/tasks",
    route(async (req, res) => {
      const body = bodyOf(req);
      const task = await orchestrator.createTask(parseInput(CreateTaskSchema, body), readActor(body, req.headers));
      res.status(201).json(task);
    })
  );

  app.get(
    "/tasks",
    route(async (req, res) => {
      const filter = parseInput(TaskFilterSchema, {
        status: query(req, "status"),
        channel: query(req, "channel"),
        type: query(req, "type"),
        limit: queryInt(req, "limit"),
        includeAll: query(req, "all") === "true" || query(req, "all") === "1",
        sort: query(req, "sort"),
      });
      res.json(await orchestrator.listTasks(filter));
    })
  );

  app.get(
    "/tasks/:id",
    route(async (req, res) => {
      res.json(await orchestrator.getTask(req.params.id));
    })
  );

  app.patch(
    "/tasks/:id",
    route(async (req, res) => {
      const body = bodyOf(req);
      const fields = parseInput(UpdateTaskSchema, {
        title: body.title,
        description: body.description,
        priority: body.priority,
      });
      res.json(await orchestrator.updateTask(req.params.id, fields, readActor(body, req.headers)));
    })
  );

  app.delete(
    "/tasks/:id",
    route(async (req, res) => {
      await orchestrator.deleteTask(req.params.id, readActor(bodyOf(req), req.headers));
      res.status(204).end();
    })
  );

  app.post(
    "/tasks/:id/claim",
    route(async (req, res) => {
      const body = bodyOf(req);
      res.json(await orchestrator.claimTask(req.params.id, readActor(body, req.headers), optionalLease(body.leaseMs)));
    })
  );

  app.post(
    "/tasks/:id/renew",
    route(async (req, res) => {
      const body = bodyOf(req);
      res.json(await orchestrator.renewLease(req.params.id, readActor(body, req.headers), optionalLease(body.leaseMs)));
    })
  );

  app.post(
    "/tasks/:id/complete",
    route(async (req, res) => {
      const body = bodyOf(req);
      const outputs = body.outputs === undefined ? undefined : parseInput(JsonValueSchema, body.outputs);
      res.json(await orchestrator.completeTask(req.params.id, readActor(body, req.headers), outputs));
    })
  );

  app.post(
    "/tasks/:id/cancel",
    route(async (req, res) => {
      res.json(await orchestrator.cancelTask(req.params.id, readActor(bodyOf(req), req.headers)));
    })
  );

  app.post(
    "/tasks/:id/fail",
    route(async (req, res) => {
      const body = bodyOf(req);
      const reason = parseInput(RequiredReasonSchema, body.reason);
      res.json(await orchestrator.failTask(req.params.id, readActor(body, req.headers), reason));
    })
  );

  app.post(
    "/tasks/:id/reject",
    route(async (req, res) => {
      const body = bodyOf(req);
      const reason = parseInput(RequiredReasonSchema, body.reason);
      res.json(await orchestrator.rejectTask(req.params.id, readActor(body, req.headers), reason));
    })
  );

  app.post(
    "/tasks/:id/reopen",
    route(async (req, res) => {
      const body = bodyOf(req);
      const reason = parseInput(OptionalReasonSchema, body.reason);
      res.json(await orchestrator.reopenTask(req.params.id, readActor(body, req.headers), reason));
    })
  );

  // -------------------------------------------------------------------------
  // Messages
  // -------------------------------------------------------------------------
  app.get(
    "/tasks/:id/messages",
    route(async (req, res) => {
      res.json(await orchestrator.listMessages(req.params.id));
    })
  );

  app.post(
    "/tasks/:id/messages",
    route(async (req, res) => {
      const body = bodyOf(req);
      const content = parseInput(JsonValueSchema, body.content ?? null);
      const contentType = typeof body.contentType === "string" ? body.contentType : undefined;
      const message = await orchestrator.addMessage(req.params.id, readActor(body, req.headers), content, contentType);
      res.status(201).json(message);
    })
  );

  // -------------------------------------------------------------------------
  // Watch (Server-Sent Events)
  // -------------------------------------------------------------------------
  app.get(
    "/events",
    route(async (req, res) => {
      const kinds = query(req, "kinds");
      const filter = parseInput(WatchFilterSchema, {
        channel: query(req, "channel"),
        task_type: query(req, "type"),
        event_kinds: kinds?.split(",").map((k) => k.trim()),
      });

      const disconnect = new AbortController();
      const watcher = orchestrator.watch(filter, { signal: disconnect.signal });
      req.on("close", () => disconnect.abort());

      res.writeHead(200, {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      });
      res.write(": connected\n\n");

      try {
        for await (const event of watcher) {
          // A slow client backs up here; the watcher's own queue then drops, never the writer.
          if (!res.write(`event: ${event.kind}\ndata: ${JSON.stringify(event)}\n\n`)) {
            await once(res, "drain", { signal: disconnect.signal });
          }
        }
      } catch (e) {
        if (!disconnect.signal.aborted) throw e;
      } finally {
        watcher.close();
        res.end();
      }
    })
  );

  // -------------------------------------------------------------------------
  // Health
  // -------------------------------------------------------------------------
  app.get(
    "/health",
    route(async (_req, res) => {
      const report = await orchestrator.health();
      res.status(report.status === "ok" ? 200 : 503).json(report);
    })
  );

  return app;
}
