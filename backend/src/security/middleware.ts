import { Request, Response, NextFunction } from "express";
import { logger } from "../logger.js";
import { sanitizeInput } from "./guardrails.js";

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number;
  /** Seconds until the window resets; 0 when allowed. */
  retryAfter: number;
}

export class RateLimiter {
  private requests: Map<string, { count: number; resetTime: number }> =
    new Map();

  constructor(
    readonly windowMs: number = 60000,
    readonly maxRequests: number = 60,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.requests.size;
  }

  check(identifier: string): RateLimitResult {
    const now = this.now();
    const record = this.requests.get(identifier);

    if (!record || now > record.resetTime) {
      // New window
      this.evictExpired(now);
      this.requests.set(identifier, {
        count: 1,
        resetTime: now + this.windowMs,
      });
      return {
        allowed: true,
        remaining: this.maxRequests - 1,
        resetTime: now + this.windowMs,
        retryAfter: 0,
      };
    }

    if (record.count >= this.maxRequests) {
      return {
        allowed: false,
        remaining: 0,
        resetTime: record.resetTime,
        retryAfter: Math.ceil((record.resetTime - now) / 1000),
      };
    }

    record.count++;
    return {
      allowed: true,
      remaining: this.maxRequests - record.count,
      resetTime: record.resetTime,
      retryAfter: 0,
    };
  }

  reset(identifier: string): void {
    this.requests.delete(identifier);
  }

  private evictExpired(now: number): void {
    for (const [identifier, record] of this.requests) {
      if (now > record.resetTime) {
        this.requests.delete(identifier);
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function getClientId(req: Request): string {
  return `ip:${req.ip || req.socket.remoteAddress || "unknown"}`;
}

export function rateLimitMiddleware(
  limiter: RateLimiter,
  endpointName: string,
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const clientId = getClientId(req);
    const result = limiter.check(clientId);

    res.setHeader("X-RateLimit-Limit", limiter.maxRequests);
    res.setHeader("X-RateLimit-Remaining", result.remaining);
    res.setHeader(
      "X-RateLimit-Reset",
      new Date(result.resetTime).toISOString(),
    );

    if (!result.allowed) {
      logger.warn(
        {
          clientId,
          endpoint: endpointName,
          resetTime: new Date(result.resetTime).toISOString(),
        },
        "Rate limit exceeded",
      );
      res.status(429).json({
        error: "Rate limit exceeded",
        message: `Too many requests. Please try again after ${new Date(result.resetTime).toISOString()}`,
        retryAfter: result.retryAfter,
      });
      return;
    }

    next();
  };
}

/**
 * Rejects non-string or oversized message content and strips control
 * characters. Prompt-injection patterns are logged, not blocked: the
 * message can only ever select one of two order tools.
 */
export function inputValidationMiddleware(
  maxLength: number,
  fieldName: string = "content",
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const body: unknown = req.body;
    if (!isRecord(body) || body[fieldName] === undefined) {
      return next(); // Let route handler deal with missing input
    }

    const input = body[fieldName];
    if (typeof input !== "string") {
      res.status(400).json({
        error: "Invalid input",
        message: `${fieldName} must be a string`,
      });
      return;
    }

    if (input.length > maxLength) {
      logger.warn(
        {
          inputLength: input.length,
          maxLength,
          fieldName,
        },
        "Input exceeds maximum length",
      );
      res.status(400).json({
        error: "Input too long",
        message: `${fieldName} exceeds maximum length of ${maxLength} characters`,
        maxLength,
      });
      return;
    }

    const sanitization = sanitizeInput(input);
    if (sanitization.warnings.length > 0) {
      logger.debug(
        {
          warnings: sanitization.warnings,
          fieldName,
          clientId: getClientId(req),
        },
        "Input sanitization warnings",
      );
    }

    body[fieldName] = sanitization.sanitized;

    next();
  };
}

export function requestSizeLimitMiddleware(maxSizeBytes: number = 64 * 1024) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const contentLength = parseInt(req.headers["content-length"] || "0", 10);

    if (contentLength > maxSizeBytes) {
      logger.warn(
        {
          contentLength,
          maxSizeBytes,
          endpoint: req.path,
        },
        "Request size exceeds limit",
      );
      res.status(413).json({
        error: "Request too large",
        message: `Request body exceeds maximum size of ${maxSizeBytes} bytes`,
        maxSizeBytes,
      });
      return;
    }

    next();
  };
}

export function securityHeadersMiddleware(
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
  res.setHeader("Content-Security-Policy", "default-src 'none'");

  next();
}
