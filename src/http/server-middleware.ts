import { randomUUID } from 'node:crypto';

import type { Express, NextFunction, Request, Response } from 'express';

import type { ServerConfig } from '../config/types.js';

import { runWithRequestContext } from '../services/context.js';

export function createContextMiddleware(): (
  req: Request,
  _res: Response,
  next: NextFunction
) => void {
  return (_req: Request, _res: Response, next: NextFunction): void => {
    const requestId = randomUUID();

    runWithRequestContext({ requestId }, () => {
      next();
    });
  };
}

export function registerHealthRoute(app: Express, server: ServerConfig): void {
  app.get(server.healthPath, (_req, res) => {
    res.json({
      status: 'healthy',
      name: server.name,
      version: server.version,
      uptime: process.uptime(),
    });
  });
}
