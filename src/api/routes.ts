/**
 * REST API Routes.
 *
 * - GET  /for-sale/:domain?rdap=1&format=json|html
 * - POST /tools/check_for_sale (same body as the MCP tool)
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { ForSaleLookup } from '../forsale/lookup.js';
import { executeCheckForSale } from '../tools/index.js';
import { ForSaleError, LookupCancelledError, wrapError } from '../utils/errors.js';
import { formatSaleHtml } from '../utils/format.js';
import { logger } from '../utils/logger.js';

const ForSaleQuerySchema = z.object({
  rdap: z.enum(['0', '1', 'true', 'false']).optional(),
  format: z.enum(['json', 'html']).default('json'),
  cache_ttl: z.coerce.number().int().optional(),
  timeout: z.coerce.number().optional(),
});

/**
 * Abort signal that fires when the client goes away before the response.
 */
function clientSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

function statusFor(error: ForSaleError): number {
  if (error.code === 'INVALID_OPTIONS') return 400;
  return 500;
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof LookupCancelledError) {
    logger.debug('Client left before the lookup finished');
    return;
  }

  const wrapped = wrapError(error);
  if (statusFor(wrapped) === 500) {
    logger.logError('REST lookup failed', wrapped);
  }

  res.status(statusFor(wrapped)).json({
    success: false,
    error: {
      code: wrapped.code,
      message: wrapped.userMessage,
      retryable: wrapped.retryable,
    },
  });
}

/**
 * Create the REST router around a process-wide lookup.
 */
export function createApiRouter(lookup: ForSaleLookup): Router {
  const router = Router();

  router.get('/for-sale/:domain', async (req: Request, res: Response) => {
    const query = ForSaleQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({
        success: false,
        error: {
          code: 'INVALID_OPTIONS',
          message: query.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '),
          retryable: false,
        },
      });
      return;
    }

    const { rdap, format, cache_ttl, timeout } = query.data;

    try {
      const result = await executeCheckForSale(
        lookup,
        {
          domain: req.params.domain,
          enable_rdap_check: rdap === undefined ? undefined : rdap === '1' || rdap === 'true',
          cache_ttl,
          timeout,
        },
        clientSignal(res),
      );

      if (format === 'html') {
        res.type('html').send(formatSaleHtml(result));
        return;
      }

      res.json({ success: true, data: result });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/tools/check_for_sale', async (req: Request, res: Response) => {
    try {
      const result = await executeCheckForSale(lookup, req.body ?? {}, clientSignal(res));
      res.json({ success: true, data: result });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
