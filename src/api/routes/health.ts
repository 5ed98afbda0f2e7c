import { Router, type Request, type Response } from 'express';
import type { CopyTradingDriver, PositionLedger } from '../../services/copyTrading/index.js';

export interface HealthCheckDependencies {
  driver: CopyTradingDriver;
  ledger?: PositionLedger;
  exchange?: string;
  checkDatabase?: () => Promise<boolean>;
  // A running driver whose last cycle is older than this is reported degraded
  staleAfterMs?: number;
}

export function createHealthRouter(deps: HealthCheckDependencies): Router {
  const router = Router();

  /**
   * GET /health
   * Driver state, last cycle and database reachability
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      const health: {
        status: 'healthy' | 'degraded' | 'unhealthy';
        timestamp: string;
        components: Record<string, unknown>;
      } = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        components: {},
      };

      const driver = deps.driver.getStatus();
      health.components['driver'] = {
        status: driver.isRunning ? 'running' : 'stopped',
        state: driver.state,
        lastCycleAt: driver.lastCycle?.startedAt.toISOString() ?? null,
        lastCycleObserved: driver.lastCycle?.observed ?? null,
        lastCycleFailed: driver.lastCycle?.failed ?? null,
        lastError: driver.lastError ?? null,
      };
      if (!driver.isRunning) {
        health.status = 'unhealthy';
      } else if (
        deps.staleAfterMs !== undefined &&
        driver.lastCycle &&
        Date.now() - driver.lastCycle.startedAt.getTime() > deps.staleAfterMs
      ) {
        health.status = 'degraded';
      }

      if (deps.ledger) {
        health.components['ledger'] = { openPositions: deps.ledger.all().length };
      }

      if (deps.exchange) {
        health.components['exchange'] = { name: deps.exchange };
      }

      if (deps.checkDatabase) {
        const connected = await deps.checkDatabase();
        health.components['database'] = { status: connected ? 'connected' : 'disconnected', connected };
        if (!connected && health.status === 'healthy') {
          health.status = 'degraded';
        }
      }

      const statusCode = health.status === 'unhealthy' ? 503 : 200;
      res.status(statusCode).json(health);
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
