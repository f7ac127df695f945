#!/usr/bin/env tsx
/**
 * Postmark Demo Script
 *
 * Lists the templates on the configured Postmark server and prints them.
 * Reads POSTMARK_SERVER_TOKEN (and optionally POSTMARK_API_URL,
 * POSTMARK_TIMEOUT_MS) from the environment or .env.
 *
 * Usage:
 *   tsx src/scripts/demo.ts [--offset=0] [--count=20] [--bounces]
 *
 * Options:
 *   --offset=N   First template to list (default: 0)
 *   --count=N    Templates per page (default: 20)
 *   --bounces    Also list the first page of bounces
 *
 * Any failure is logged and ends the run with exit code 1.
 */

import { createPostmarkProviderFromEnv } from '../providers/postmark-api.provider.js';
import { classifyError } from '../services/error-classification.service.js';
import { logger } from '../services/logger.service.js';

interface DemoOptions {
  offset: number;
  count: number;
  bounces: boolean;
}

function parseArgs(argv: string[] = process.argv.slice(2)): DemoOptions {
  const options: DemoOptions = { offset: 0, count: 20, bounces: false };

  for (const arg of argv) {
    const [flag, value] = arg.split('=', 2);
    switch (flag) {
      case '--offset':
        options.offset = parseNonNegative(flag, value);
        break;
      case '--count':
        options.count = parseNonNegative(flag, value);
        break;
      case '--bounces':
        options.bounces = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function parseNonNegative(flag: string, value: string | undefined): number {
  const parsed = Number.parseInt(value ?? '', 10);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${flag} expects a non-negative integer`);
  }
  return parsed;
}

async function main() {
  const options = parseArgs();
  const client = createPostmarkProviderFromEnv();

  const page = await client.listTemplates(options.offset, options.count);
  console.log(`📋 ${page.items.length} of ${page.totalCount} templates\n`);
  for (const template of page.items) {
    console.log(
      `Template ID: ${template.id}, Name: ${template.name}, Subject: ${template.subject ?? ''}, Active: ${template.active}`
    );
  }

  if (options.bounces) {
    const bounces = await client.listBounces(0, options.count);
    console.log(`\n📭 ${bounces.items.length} of ${bounces.totalCount} bounces\n`);
    for (const bounce of bounces.items) {
      console.log(
        `Bounce ID: ${bounce.id}, Type: ${bounce.type}, Email: ${bounce.email}, At: ${bounce.bouncedAt}, Can activate: ${bounce.canActivate}`
      );
    }
  }
}

// Run the script
main().catch((error: unknown) => {
  const classification = classifyError(error);
  logger.error('Demo run failed', {
    error,
    category: classification.category,
    retryable: classification.isRetryable,
  });
  process.exit(1);
});
