/**
 * Express HTTP server setup with security middleware and API routes
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import helmet from 'helmet';
import { z } from 'zod';
import {
  HostLookupError,
  InvalidRuleError,
  MalformedDocumentError,
  TreeWriteError,
} from './errors.js';
import { patchDocument } from './patcher.js';
import { jsonValueSchema, parseReplacementRules } from './rules.js';
import type { AppConfig, HostConfigurationView } from './types.js';

const patchRequestSchema = z.object({
  document: jsonValueSchema,
  rules: z.unknown(),
});

/**
 * Create and configure Express application
 * Exports app for testing without starting the server
 */
export function createApp(
  config: AppConfig,
  host: HostConfigurationView
): express.Application {
  const app = express();

  // Security middleware (adds various HTTP headers)
  app.use(helmet());

  app.use(express.json({ limit: config.bodyLimit }));

  /**
   * Health check endpoint
   */
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  /**
   * Patch endpoint
   * Accepts { document, rules } and returns the patched document
   */
  app.post('/patch', (req: Request, res: Response) => {
    try {
      const body = patchRequestSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: 'Body must be { document, rules }' });
        return;
      }

      const rules = parseReplacementRules(body.data.rules, {
        max: config.maxRules,
      });
      const result = patchDocument(body.data.document, rules, host);

      res.json({
        data: result.data,
        meta: {
          rulesApplied: result.rulesApplied,
          pathsWritten: result.pathsWritten,
        },
      });
    } catch (error) {
      handleError(error, res);
    }
  });

  /**
   * 404 handler for unknown routes
   */
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  /**
   * Global error handler
   * Catches errors from middleware (JSON parsing, payload size, etc.)
   */
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Unexpected error:', err);

    const type = errorType(err);

    // Handle JSON parsing errors from body-parser
    if (type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Invalid JSON payload' });
      return;
    }

    // Handle payload too large errors
    if (type === 'entity.too.large') {
      res.status(413).json({ error: 'Payload too large' });
      return;
    }

    // Default to 500 for unknown errors
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * body-parser tags its errors with a `type` string
 */
function errorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err) {
    return typeof err.type === 'string' ? err.type : undefined;
  }
  return undefined;
}

/**
 * Handle errors and send appropriate HTTP response
 * Never leak host configuration details to client
 */
function handleError(error: unknown, res: Response): void {
  // Log full error server-side
  console.error('Request error:', error);

  if (error instanceof InvalidRuleError || error instanceof MalformedDocumentError) {
    res.status(400).json({ error: error.message, code: error.code });
    return;
  }

  if (error instanceof TreeWriteError) {
    res.status(422).json({ error: error.message, code: error.code });
    return;
  }

  if (error instanceof HostLookupError) {
    res
      .status(500)
      .json({ error: 'Host configuration lookup failed', code: error.code });
    return;
  }

  // Unknown error type
  res.status(500).json({ error: 'Internal server error' });
}
