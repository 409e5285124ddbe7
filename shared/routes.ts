import { z } from "zod";
import { USER_STATES } from "./schema";

export const errorSchemas = {
  unauthorized: z.object({
    message: z.string(),
  }),
  notFound: z.object({
    message: z.string(),
  }),
  unavailable: z.object({
    message: z.string(),
  }),
  internal: z.object({
    message: z.string(),
  }),
};

export const healthSchema = z.object({
  ok: z.boolean(),
  uptime: z.number(),
  timestamp: z.string(),
  version: z.string(),
  service: z.string(),
});

export const subscriberSummarySchema = z.object({
  id: z.number(),
  clientId: z.string(),
  telegramId: z.string().nullable(),
  state: z.enum(USER_STATES).nullable(),
  usedBytes: z.number(),
  dataCapBytes: z.number().nullable(),
  expiresAt: z.string().nullable(),
  lastCheckedAt: z.string().nullable(),
});

export type SubscriberSummary = z.infer<typeof subscriberSummarySchema>;

export const cycleReportSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  fetched: z.number(),
  reconciled: z.number(),
  failures: z.array(
    z.object({
      userId: z.number(),
      clientId: z.string(),
      stage: z.enum(["reconcile", "persist", "notify"]),
      message: z.string(),
    }),
  ),
  notified: z.number(),
  unmatched: z.number(),
  missing: z.number(),
  error: z.string().optional(),
});

export const backupResultSchema = z.object({
  fileName: z.string(),
  sizeBytes: z.number(),
  removed: z.array(z.string()),
  delivered: z.number(),
});

export const api = {
  health: {
    method: "GET" as const,
    path: "/health",
    responses: {
      200: healthSchema,
    },
  },
  subscribers: {
    list: {
      method: "GET" as const,
      path: "/api/subscribers",
      input: z
        .object({
          state: z.enum(USER_STATES).optional(),
        })
        .optional(),
      responses: {
        200: z.array(subscriberSummarySchema),
        401: errorSchemas.unauthorized,
      },
    },
    get: {
      method: "GET" as const,
      path: "/api/subscribers/:id",
      responses: {
        200: subscriberSummarySchema,
        401: errorSchemas.unauthorized,
        404: errorSchemas.notFound,
      },
    },
  },
  poll: {
    run: {
      method: "POST" as const,
      path: "/api/poll",
      responses: {
        200: cycleReportSchema,
        401: errorSchemas.unauthorized,
      },
    },
  },
  backups: {
    create: {
      method: "POST" as const,
      path: "/api/backups",
      responses: {
        201: backupResultSchema,
        401: errorSchemas.unauthorized,
        503: errorSchemas.unavailable,
      },
    },
  },
};
