#!/usr/bin/env node
/**
 * Export one text synchronously, bypassing the queue.
 *
 * Usage:
 *   npm run export:text -- <textId>
 *   npm run export:text -- <textId> --force
 *   npm run export:text -- <textId> --generate-missing --format wav --padding 0.25
 *   npm run export:text -- <textId> --status
 *   npm run export:text -- <textId> --out ./my-export.mp3
 *
 * Environment:
 *   DATABASE_URL, UPLOAD_DIR and the provider keys, as for the server.
 */

import { loadEnv } from '../config/env';
loadEnv();

import fs from 'fs/promises';
import { logger } from '../config/logger';
import { getSettings } from '../config/settings';
import { connectDB, disconnectDB } from '../config/mongoose';
import { MongoArtifactStore } from '../store/mongo-artifact.store';
import { createServices } from '../services/container';
import { parseExportArgs } from './export-args';

async function main(): Promise<number> {
  const parsed = parseExportArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.message);
    return 2;
  }
  const { textId, overrides, out } = parsed.args;

  const settings = getSettings();
  await connectDB(settings.databaseUrl);
  const store = new MongoArtifactStore(settings.exportsDir);
  const { orchestrator } = createServices(settings, store);

  if (parsed.args.status) {
    const status = await orchestrator.getExportStatus(textId);
    console.log(JSON.stringify(status, null, 2));
    return 0;
  }

  // Ctrl+C cancels in-flight provider calls without committing partial results
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const outcome = await orchestrator.export(textId, overrides, {
    force: parsed.args.force,
    generateMissing: parsed.args.generateMissing,
    signal: controller.signal,
  });

  if (!outcome.ok) {
    console.error(`Export failed [${outcome.error.code}]: ${outcome.error.message}`);
    return 1;
  }

  if (out) {
    await fs.writeFile(out, await store.readFinalAudio(outcome.artifact));
  }

  console.log(
    JSON.stringify(
      {
        artifact: out ?? outcome.artifact.uri,
        durationSec: outcome.artifact.durationSec,
        reused: outcome.reused,
        startedFrom: outcome.startedFrom,
        omissions: outcome.omissions,
      },
      null,
      2
    )
  );
  return 0;
}

main()
  .then(async (code) => {
    await disconnectDB();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    logger.error('Export script failed:', error);
    await disconnectDB();
    process.exit(1);
  });
