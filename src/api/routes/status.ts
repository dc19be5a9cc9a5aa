/**
 * Status Routes
 *
 * GET /api/health        - Liveness and kill-switch state
 * GET /api/opportunities - Open opportunities, best edge first
 * GET /api/attempts      - In-flight and recent execution attempts
 * GET /api/exposure      - Per-venue exposure and positions
 * GET /api/pnl           - Realized and locked P&L
 * GET /api/crossbook     - Report-only arbitrages and value bets between odds venues
 * GET /api/budget        - API spend, bankroll and reserve
 */

import { Router, type Request, type Response } from "express";
import type { PipelineSnapshot } from "../../pipeline/scanCycle";

export interface StatusSource {
  getSnapshot(): PipelineSnapshot;
  readonly isRunning: boolean;
}

export function healthBody(source: StatusSource) {
  const snapshot = source.getSnapshot();
  return {
    status: snapshot.killSwitch.halted ? "halted" : "ok",
    running: source.isRunning,
    timestamp: new Date(snapshot.ts).toISOString(),
    cycles: snapshot.cycles,
    pairs: snapshot.pairs,
    lastScan: snapshot.lastScan,
    killSwitch: snapshot.killSwitch,
  };
}

export function opportunitiesBody(snapshot: PipelineSnapshot) {
  return { count: snapshot.opportunities.length, opportunities: snapshot.opportunities };
}

export function attemptsBody(snapshot: PipelineSnapshot) {
  return { open: snapshot.openAttempts, recent: snapshot.recentAttempts };
}

export function exposureBody(snapshot: PipelineSnapshot) {
  const venues = Object.values(snapshot.exposure);
  return {
    venues,
    totalOpenNotional: venues.reduce((sum, venue) => sum + venue.openNotional, 0),
    totalPendingNotional: venues.reduce((sum, venue) => sum + venue.pendingNotional, 0),
    openPositions: snapshot.positions.filter((position) => position.status === "open"),
  };
}

export function pnlBody(snapshot: PipelineSnapshot) {
  return snapshot.pnl;
}

export function crossBookBody(snapshot: PipelineSnapshot) {
  return {
    arbitrages: snapshot.crossBook.filter((opportunity) => opportunity.strategy === "arbitrage"),
    valueBets: snapshot.crossBook.filter((opportunity) => opportunity.strategy === "value_bet"),
  };
}

export function budgetBody(snapshot: PipelineSnapshot) {
  return snapshot.budget;
}

export function createStatusRouter(source: StatusSource): Router {
  const router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    res.json(healthBody(source));
  });
  router.get("/opportunities", (_req: Request, res: Response) => {
    res.json(opportunitiesBody(source.getSnapshot()));
  });
  router.get("/attempts", (_req: Request, res: Response) => {
    res.json(attemptsBody(source.getSnapshot()));
  });
  router.get("/exposure", (_req: Request, res: Response) => {
    res.json(exposureBody(source.getSnapshot()));
  });
  router.get("/pnl", (_req: Request, res: Response) => {
    res.json(pnlBody(source.getSnapshot()));
  });
  router.get("/crossbook", (_req: Request, res: Response) => {
    res.json(crossBookBody(source.getSnapshot()));
  });
  router.get("/budget", (_req: Request, res: Response) => {
    res.json(budgetBody(source.getSnapshot()));
  });

  return router;
}
