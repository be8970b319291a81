#!/usr/bin/env node
// src/cli.ts
import 'dotenv/config';
import { existsSync } from 'node:fs';
import { loadConfig } from './config.js';
import { discoverCsvSources, writeRunOutputs, writeSampleData } from './csv.js';
import { formatReport } from './ledger.js';
import { runPipeline } from './pipeline.js';
import { formatSummary } from './summary.js';
import type { IngestEvent } from './types.js';

function logEvent(e: IngestEvent) {
  if (e.type === 'SOURCE_LOADED') {
    console.log(`Successfully loaded: ${e.origin} (${e.accepted}/${e.rows} rows)`);
    return;
  }
  const d = e.diagnostic;
  const where = d.row === undefined ? d.origin : `${d.origin}#${d.row}`;
  if (d.kind === 'SOURCE_UNAVAILABLE') console.error(`Error loading ${where}: ${d.message}`);
  else console.error(`Skipped ${where} [${d.kind}/${d.reason}]: ${d.message}`);
}

function main(argv: string[] = process.argv.slice(2)): number {
  const config = loadConfig();
  const dataDir = argv[0] ?? config.dataDir;
  const outDir = argv[1] ?? config.outputDir;

  if (!existsSync(dataDir)) {
    console.log(`Warning: ${dataDir} directory not found. Creating sample data for demonstration.`);
    writeSampleData(dataDir);
  }

  const result = runPipeline(discoverCsvSources(dataDir), {
    bins: config.histogramBins,
    onEvent: logEvent,
  });

  if (result.status === 'ok') {
    for (const r of result.ledgerReports) console.log(formatReport(r));
    console.log(formatSummary(result.summary));
  } else {
    console.log(formatSummary(result));
  }

  const written = writeRunOutputs(outDir, result);
  console.log(`Pipeline complete. Files exported: ${written.join(', ')}`);
  if (result.diagnostics.length) console.log(`${result.diagnostics.length} row(s)/source(s) skipped, see messages above`);
  return 0;
}

try {
  process.exitCode = main();
} catch (e) {
  console.error(e);
  process.exitCode = 1;
}
