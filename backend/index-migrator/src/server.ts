/**
 * Health / readiness HTTP server
 */

import express, { Express } from 'express';
import { securityHeaders } from './middleware/securityHeaders';
import { HealthCheckService } from './services';
import { createLogger } from './utils/logger';

const logger = createLogger('Server');

export interface BuildInfo {
  name: string;
  version: string;
}

export interface HealthServerConfig {
  health: HealthCheckService;
  buildInfo: BuildInfo;
}

/**
 * ハンドラーが使うレスポンス操作（express の Response が満たす）
 */
export interface HandlerResponse {
  status(code: number): HandlerResponse;
  type(contentType: string): HandlerResponse;
  json(body: unknown): unknown;
  send(body: string): unknown;
}

type Handler = (req: unknown, res: HandlerResponse) => Promise<void> | void;

export function healthHandler(health: HealthCheckService): Handler {
  return async (_req, res) => {
    try {
      res.status(200).json(await health.report());
    } catch (error) {
      logger.error('Health report failed', { error });
      res.status(500).json({ ok: false, error: 'health report failed' });
    }
  };
}

/**
 * クラスタが green でなければ 503
 */
export function goodToGoHandler(health: HealthCheckService): Handler {
  return async (_req, res) => {
    let ok = false;
    try {
      ok = await health.goodToGo();
    } catch (error) {
      logger.warn('Good-to-go check failed', { error });
    }

    if (ok) {
      res.status(200).type('text/plain').send('OK');
    } else {
      res.status(503).type('text/plain').send('Service Unavailable');
    }
  };
}

export function buildInfoHandler(buildInfo: BuildInfo): Handler {
  return (_req, res) => {
    res.status(200).json(buildInfo);
  };
}

export function createHealthServer(config: HealthServerConfig): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(securityHeaders());

  app.get('/__health', healthHandler(config.health));
  app.get('/__gtg', goodToGoHandler(config.health));
  app.get('/__build-info', buildInfoHandler(config.buildInfo));

  return app;
}
