#!/usr/bin/env node
import 'dotenv/config';
import { access, constants, mkdir } from 'node:fs/promises';
import { describeCause } from '../domain/errors.js';
import { loadConfig } from '../infrastructure/config.js';
import { startWatcher } from '../infrastructure/file-watcher.js';
import { createVisionModel } from '../infrastructure/llm/index.js';
import { logger } from '../infrastructure/logger.js';
import { createOperatorConsole } from '../infrastructure/operator-console.js';
import { PdfToImgRasterizer } from '../infrastructure/pdf-rasterizer.js';
import { IntakePipeline } from '../services/intake/index.js';
import { runSweep } from '../services/sweep/index.js';
import { watchUntilShutdown } from './lifecycle.js';

function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    logger.info({ signal: name }, 'Shutdown requested');
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return controller.signal;
}

async function main(): Promise<number> {
  const configResult = loadConfig();
  if (!configResult.ok) {
    logger.fatal({ errorCode: configResult.error.code, details: configResult.error.details }, configResult.error.message);
    return 1;
  }
  const config = configResult.value;

  try {
    await mkdir(config.watchDir, { recursive: true });
    await access(config.watchDir, constants.R_OK | constants.W_OK);
  } catch (cause) {
    logger.fatal({ watchDir: config.watchDir, details: describeCause(cause) }, 'Watch directory is not accessible');
    return 1;
  }

  const shutdown = shutdownSignal();
  const operator = createOperatorConsole();
  const model = createVisionModel({
    provider: 'ollama',
    host: config.ollamaHost,
    model: config.model,
    timeoutMs: config.modelTimeoutSeconds * 1000,
  });
  const pipeline = new IntakePipeline({
    config,
    model,
    rasterizer: new PdfToImgRasterizer(config.pdfRenderScale),
    console: operator,
  });

  if (config.sweepOnStart) {
    await runSweep(config.watchDir, { pipeline, console: operator, signal: shutdown });
  }

  return watchUntilShutdown({
    watchDir: config.watchDir,
    modelName: config.model,
    startWatcher,
    pipeline,
    model,
    console: operator,
    signal: shutdown,
  });
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    logger.fatal({ err: describeCause(err) }, 'scan-renamer crashed');
    process.exit(1);
  },
);
