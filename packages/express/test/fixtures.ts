/**
 * Test fixtures for the Express integration.
 */

import express, { type Express } from 'express';
import type { Logger } from '@tidewater/core';
import { TestHarness, type TestHarnessOptions } from '@tidewater/core/test';
import { TidewaterExpress } from '../src/tidewater-express';

export function recordingLogger(lines: string[]): Logger {
  return {
    info: m => lines.push(`info ${m}`),
    warn: m => lines.push(`warn ${m}`),
    error: m => lines.push(`error ${m}`),
  };
}

export interface TestApp {
  app: Express;
  t: TestHarness;
  tidewater: TidewaterExpress;
  /** Lines written by the Express error handler */
  lines: string[];
}

/**
 * Express app serving a TestHarness engine.
 */
export async function createTestApp(options: TestHarnessOptions = {}): Promise<TestApp> {
  const t = await new TestHarness(options).ready();
  const app = express();
  const lines: string[] = [];
  const tidewater = await TidewaterExpress.builder()
    .app(app)
    .engine(t.engine)
    .logger(recordingLogger(lines))
    .build();
  return { app, t, tidewater, lines };
}
