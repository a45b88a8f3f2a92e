#!/usr/bin/env node
/**
 * textembed CLI
 *
 * Compute text embeddings for compressed JSONL document streams and mirror
 * S3 objects as local stamp files.
 */

import { config as loadDotenv } from 'dotenv';
import { Command } from 'commander';
import { embedCommand } from './cli/embed.js';
import { stampsCommand } from './cli/stamps.js';
import { fatal } from './cli/utils.js';
import { describeError } from './lib/errors.js';

loadDotenv();

const program = new Command()
  .name('textembed')
  .description('Compute text embeddings for JSONL documents on S3 or local disk')
  .version('0.1.0');

// Register commands
program.addCommand(embedCommand);
program.addCommand(stampsCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  fatal(describeError(error));
});
