import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createProvider } from '../providers/index.js';
import { AuthProxy } from '../proxy/server.js';
import { AuthPreparationError } from '../proxy/errors.js';
import { DEFAULT_AUTHORITY } from '../providers/core/base/aad-endpoints.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_LOCAL_ADDR, parseCliOptions } from './options.js';
import type { ProxyOptions } from './options.js';

const PackageVersionSchema = z.object({ version: z.string() });

export type ProxyRunner = (options: ProxyOptions) => Promise<void>;

function readVersion(): string {
  try {
    const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
    const packageJson = PackageVersionSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return packageJson.success ? packageJson.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Build the provider, prepare access and serve until SIGINT/SIGTERM
 */
export async function runProxy({ params, credentials }: ProxyOptions): Promise<void> {
  const provider = createProvider(params, credentials);
  const proxy = new AuthProxy({ params, provider });

  let url: string;
  try {
    ({ url } = await proxy.start());
  } catch (error) {
    provider.client().close();
    throw error;
  }
  logger.success(`Proxy listening on ${url}`);
  console.log(chalk.cyan(`  ${params.method} → ${params.remote}`));
  console.log(chalk.dim(`  whenlog=${params.whenlog} whatlog=${params.whatlog}`));

  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    proxy.stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

export function createCLI(run: ProxyRunner = runProxy): Command {
  const program = new Command();

  program
    .name('authforward')
    .description('Forward local requests to a remote endpoint, attaching basic or OAuth credentials')
    .version(readVersion())
    .option('--method <method>', 'Authentication method: basic, authcode (authorization code), client (client credentials) or device (device flow)', 'basic')
    .option('--local <addr>', 'Local address to bind to', DEFAULT_LOCAL_ADDR)
    .option('--remote <addr>', 'Remote endpoint address (host[:port])')
    .option('--cert <path>', '(Optional) File path to root CA')
    .option('--insecure', '(Optional) Skip certificate verifications', false)
    .option('--username <username>', 'Basic auth: username')
    .option('--password <password>', 'Basic auth: password')
    .option('--client-id <id>', 'OAuth: application (client) ID')
    .option('--tenant-id <id>', 'OAuth: directory (tenant) ID')
    .option('--client-secret <secret>', 'OAuth: client secret')
    .option('--authcode-addr <addr>', 'OAuth: local address to receive authorization callbacks', DEFAULT_LOCAL_ADDR)
    .option('--authority <url>', 'OAuth: authority base URL', DEFAULT_AUTHORITY)
    .option('--scope <scope...>', 'OAuth: scopes to request (defaults depend on the method)')
    .option('--whenlog <when>', 'When request logs are printed: always, onNon200 or onError', 'onError')
    .option('--whatlog <what>', 'What request logs contain: basic or detailed', 'basic')
    .option('--debugmode', 'Force whenlog=always and whatlog=detailed', false)
    .action(async (rawOptions: Record<string, unknown>) => {
      try {
        await run(parseCliOptions(rawOptions));
      } catch (error: unknown) {
        if (error instanceof ConfigurationError) {
          console.error(chalk.red(error.message));
          program.outputHelp();
        } else if (error instanceof AuthPreparationError) {
          logger.error('Could not obtain credentials:', error);
        } else {
          logger.error('Failed to start proxy:', error);
        }
        process.exitCode = 1;
      }
    });

  return program;
}
