#!/usr/bin/env node
/**
 * Index Migrator - Main Entry Point
 */

// 環境変数を読み込み（ロガーより先に）
import 'dotenv/config';
import { buildProgram } from './cli';
import { createLogger } from './utils/logger';

const logger = createLogger('Main');

buildProgram()
  .parseAsync()
  .catch((error: unknown) => {
    logger.error('Fatal error', { error });
    process.exit(1);
  });
