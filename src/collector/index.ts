/**
 * Report Collector - Merges reports from many probes into one topology
 *
 * Holds every report received within a sliding time window and merges them
 * on demand. The merged topology is cached and replaced wholesale whenever
 * the set of held reports changes; callers holding an earlier result keep a
 * consistent, unchanging value.
 */
import { Report, decodeReport } from '../report/codec';
import { TopologyValidationError } from '../report/errors';
import { Topology } from '../report/topology';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { SchemaValidationError } from '../utils/schema-validator';
import Config, { CollectorConfig } from '../config';

export type AddStatus = 'accepted' | 'duplicate' | 'stale' | 'invalid';

export class ReportCollector {
  // Held reports in arrival order; the oldest by timestamp is evicted first
  private reports: Report[] = [];

  // IDs of held reports, so probe retries are not counted twice
  private reportIds = new Set<string>();

  private merged: Topology | null = null;

  constructor(private options: CollectorConfig = Config.collector) {}

  /**
   * Number of reports currently held
   */
  get size(): number {
    return this.reports.length;
  }

  /**
   * Validate, decode and hold a raw report message.
   * @param message Parsed JSON as received from a probe
   * @param now Current time in epoch-ms
   */
  add(message: unknown, now: number = Date.now()): AddStatus {
    let report: Report;
    try {
      report = decodeReport(message);
    } catch (err) {
      if (err instanceof SchemaValidationError) {
        metrics.reportsReceived.inc({ status: 'invalid' });
        logger.warn({ errors: err.errors }, 'Rejected invalid report');
        return 'invalid';
      }
      throw err;
    }
    return this.addReport(report, now);
  }

  /**
   * Hold an already decoded report.
   */
  addReport(report: Report, now: number = Date.now()): AddStatus {
    const status = this.admit(report, now);
    metrics.reportsReceived.inc({ status });

    if (status !== 'accepted') {
      logger.debug({ reportId: report.reportId, probeId: report.probeId, status }, 'Report not held');
      return status;
    }

    this.reports.push(report);
    this.reportIds.add(report.reportId);
    while (this.reports.length > this.options.maxReports) {
      this.drop(this.oldestIndex());
    }
    this.merged = null;
    metrics.reportsInWindow.set(this.reports.length);

    logger.debug({
      reportId: report.reportId,
      probeId: report.probeId,
      nodes: report.topology.nodeMetadatas.size,
      edges: report.topology.edgeMetadatas.size,
    }, 'Report accepted');

    return status;
  }

  /**
   * Merge every report still inside the window into one topology.
   *
   * Reports are folded newest first, ordered by timestamp and then report
   * ID, so the result does not depend on arrival order. Node metadata is
   * never overwritten by a collection merge, which means the most recent
   * report's view of a node is the one kept.
   */
  report(now: number = Date.now()): Topology {
    this.expire(now);
    if (this.merged !== null) {
      return this.merged;
    }

    const start = Date.now();
    const ordered = this.reports.slice().sort(newestFirst);
    const merged = ordered.reduce((acc, r) => acc.merge(r.topology), Topology.make());
    metrics.reportMergeTime.observe(Date.now() - start);

    metrics.topologyNodesTotal.set(merged.nodeMetadatas.size);
    metrics.topologyEdgesTotal.set(merged.edgeMetadatas.size);
    logger.debug({
      reports: ordered.length,
      nodes: merged.nodeMetadatas.size,
      edges: merged.edgeMetadatas.size,
    }, 'Merged reports');

    this.merged = merged;
    return merged;
  }

  /**
   * Validate the merged topology.
   * @returns null when consistent, otherwise every violation found
   */
  validate(now: number = Date.now()): TopologyValidationError | null {
    const err = this.report(now).validate();
    if (err !== null) {
      metrics.validationViolationsTotal.inc(err.violations.length);
      logger.warn({ violations: err.violations }, 'Merged topology is inconsistent');
    }
    return err;
  }

  clear(): void {
    this.reports = [];
    this.reportIds.clear();
    this.merged = null;
    metrics.reportsInWindow.set(0);
  }

  private admit(report: Report, now: number): AddStatus {
    if (this.reportIds.has(report.reportId)) {
      return 'duplicate';
    }
    if (report.timestamp.getTime() < now - this.options.windowMs) {
      return 'stale';
    }
    return 'accepted';
  }

  private expire(now: number): void {
    const cutoff = now - this.options.windowMs;
    for (let i = this.reports.length - 1; i >= 0; i--) {
      if (this.reports[i].timestamp.getTime() < cutoff) {
        this.drop(i);
      }
    }
    metrics.reportsInWindow.set(this.reports.length);
  }

  // Index of the report that sorts last in newestFirst order
  private oldestIndex(): number {
    let oldest = 0;
    for (let i = 1; i < this.reports.length; i++) {
      if (newestFirst(this.reports[i], this.reports[oldest]) > 0) {
        oldest = i;
      }
    }
    return oldest;
  }

  private drop(index: number): void {
    const [removed] = this.reports.splice(index, 1);
    this.reportIds.delete(removed.reportId);
    this.merged = null;
  }
}

function newestFirst(a: Report, b: Report): number {
  const dt = b.timestamp.getTime() - a.timestamp.getTime();
  if (dt !== 0) {
    return dt;
  }
  if (a.reportId === b.reportId) {
    return 0;
  }
  return a.reportId < b.reportId ? -1 : 1;
}
