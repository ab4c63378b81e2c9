#!/usr/bin/env ts-node
/**
 * Merge Reports Script
 *
 * Reads report JSON files, merges them the way the collector does and prints
 * the merged topology. Exits non-zero when the merged topology is
 * inconsistent.
 *
 * Usage: npm run merge-reports -- <report.json> [report.json...]
 */
import { promises as fs } from 'fs';
import { ReportCollector } from '../src/collector';
import { encodeTopology } from '../src/report/codec';
import { logger } from '../src/utils/logger';

async function main(): Promise<void> {
  const files = process.argv.slice(2);
  if (files.length === 0) {
    console.error('Error: at least one report file is required');
    console.error('Usage: npm run merge-reports -- <report.json> [report.json...]');
    process.exit(1);
  }

  // Files on disk may be old; keep every one of them in the window
  const collector = new ReportCollector({ windowMs: Number.MAX_SAFE_INTEGER, maxReports: files.length });

  for (const file of files) {
    const raw = await fs.readFile(file, 'utf8');
    const status = collector.add(JSON.parse(raw));
    logger.info({ file, status }, 'Loaded report');
  }

  console.log(JSON.stringify(encodeTopology(collector.report()), null, 2));

  const err = collector.validate();
  if (err !== null) {
    for (const violation of err.violations) {
      console.error(violation);
    }
    process.exit(2);
  }
}

// Execute if run directly
if (require.main === module) {
  main().catch(err => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
