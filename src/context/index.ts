/**
 * Context module — per-term resolution, budgeted aggregation, batch fan-out.
 */

export * from './resolver.js';
export * from './aggregator.js';
export * from './orchestrator.js';
export * from './service.js';
