import express, {
  type ErrorRequestHandler,
  type Express,
  type Response,
} from "express";
import cors from "cors";
import { Config } from "./config/env.js";
import { logger } from "./logger.js";
import { OrderStore } from "./database/index.js";
import { Orchestrator } from "./orchestrator/index.js";
import {
  ConversationIdSchema,
  SendMessageRequestSchema,
} from "./models/conversation.js";
import {
  RateLimiter,
  inputValidationMiddleware,
  rateLimitMiddleware,
  requestSizeLimitMiddleware,
  securityHeadersMiddleware,
} from "./security/middleware.js";

export interface AppDependencies {
  config: Config;
  orderStore: OrderStore;
  orchestrator: Orchestrator;
}

function conversationNotFound(res: Response): void {
  res.status(404).json({ error: "Conversation not found" });
}

function hasStatus(error: unknown): error is { status: number } {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  );
}

// body-parser errors carry a 4xx status; anything else is ours
const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  const err: unknown = error;
  if (hasStatus(err) && err.status >= 400 && err.status < 500) {
    logger.debug({ err, path: req.path }, "Rejected malformed request");
    res.status(err.status).json({
      error: "Invalid request",
      message: err instanceof Error ? err.message : "Malformed request",
    });
    return;
  }

  logger.error({ err, path: req.path }, "Unhandled error");
  res.status(500).json({ error: "Internal server error" });
};

export function createApp({
  config,
  orderStore,
  orchestrator,
}: AppDependencies): Express {
  const app = express();
  const messageRateLimiter = new RateLimiter(60000, config.rateLimitPerMinute);

  app.use(securityHeadersMiddleware);
  app.use(requestSizeLimitMiddleware(64 * 1024));
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: "64kb" }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      mode: orchestrator.mode,
      timestamp: new Date().toISOString(),
    });
  });

  app.post("/conversations", (_req, res) => {
    const conversationId = orchestrator.createConversation();
    res.status(201).json({ conversation_id: conversationId });
  });

  app.get("/conversations/:conversationId/messages", (req, res) => {
    const { conversationId } = req.params;
    const messages = ConversationIdSchema.safeParse(conversationId).success
      ? orchestrator.getMessages(conversationId)
      : null;

    if (!messages) {
      return conversationNotFound(res);
    }

    return res.json({ messages });
  });

  app.post(
    "/conversations/:conversationId/messages",
    rateLimitMiddleware(messageRateLimiter, "messages"),
    inputValidationMiddleware(config.maxMessageLength, "content"),
    async (req, res) => {
      const { conversationId } = req.params;
      if (!ConversationIdSchema.safeParse(conversationId).success) {
        return conversationNotFound(res);
      }

      const body = SendMessageRequestSchema.safeParse(req.body);
      if (!body.success) {
        return res.status(400).json({
          error: "Invalid request",
          message: body.error.issues.map((issue) => issue.message).join("; "),
        });
      }

      try {
        const turn = await orchestrator.processMessage(
          conversationId,
          body.data.content,
        );
        if (!turn) {
          return conversationNotFound(res);
        }

        return res.json(turn);
      } catch (error) {
        logger.error({ error, conversationId }, "Error processing message");
        return res.status(500).json({
          error: "Failed to process message",
          message: error instanceof Error ? error.message : "Unknown error",
        });
      }
    },
  );

  app.get("/orders", (_req, res) => {
    res.json({ orders: orderStore.list() });
  });

  app.get("/orders/:orderId", (req, res) => {
    const order = orderStore.get(req.params.orderId);

    if (!order) {
      return res.status(404).json({ error: "Order not found" });
    }

    return res.json({ order });
  });

  app.patch("/orders/:orderId/cancel", (req, res) => {
    const outcome = orderStore.cancel(req.params.orderId);

    if (outcome.ok) {
      return res.json({ success: true, order: outcome.order });
    }

    if (outcome.reason === "not_found") {
      return res.status(404).json({ error: "Order not found" });
    }

    return res.status(409).json({
      error: "Order cannot be canceled",
      status: outcome.order.status,
    });
  });

  app.use(errorHandler);

  return app;
}
