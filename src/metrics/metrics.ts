/**
 * Metrics module for the topology collector using Prometheus client
 */
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { logger } from '../utils/logger';

// Initialize Prometheus registry
const register = new Registry();

// Add default metrics (CPU, memory, event loop, etc.)
collectDefaultMetrics({ register });

export const metrics = {
  // Counter for reports offered to the collector, by outcome
  reportsReceived: new Counter({
    name: 'topology_reports_received_total',
    help: 'Total number of reports received, by status',
    labelNames: ['status'] as const,
    registers: [register],
  }),

  // Gauge for reports currently held in the window
  reportsInWindow: new Gauge({
    name: 'topology_reports_in_window',
    help: 'Number of reports held in the current window',
    registers: [register],
  }),

  // Histogram for merging the window into one topology, in milliseconds
  reportMergeTime: new Histogram({
    name: 'topology_report_merge_time_ms',
    help: 'Time taken to merge the held reports into one topology in milliseconds',
    buckets: [1, 5, 10, 50, 100, 500, 1000],
    registers: [register],
  }),

  topologyNodesTotal: new Gauge({
    name: 'topology_nodes_total',
    help: 'Number of nodes in the merged topology',
    registers: [register],
  }),

  topologyEdgesTotal: new Gauge({
    name: 'topology_edges_total',
    help: 'Number of edges in the merged topology',
    registers: [register],
  }),

  // Counter for inconsistencies found by validate()
  validationViolationsTotal: new Counter({
    name: 'topology_validation_violations_total',
    help: 'Total number of inconsistencies found when validating the merged topology',
    registers: [register],
  }),
};

/**
 * Get all metrics for Prometheus scraping
 * @returns Promise resolving to metrics string
 */
export async function getMetrics(): Promise<string> {
  try {
    return await register.metrics();
  } catch (err) {
    logger.error({ error: err }, 'Error collecting metrics');
    throw err;
  }
}

export default {
  metrics,
  getMetrics,
  register
};
