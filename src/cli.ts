#!/usr/bin/env node

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { OAuthFlow } from './auth/oauthFlow.js';
import { Credential } from './auth/tokenExchange.js';
import { resolveFlowConfig, StrategyName } from './config/flowConfig.js';
import { getUserMessage, LoopbackAuthError } from './errors/authErrors.js';
import { createLogger, mask } from './utils/logger.js';

const logger = createLogger('CLI');

const USAGE = 'Usage: loopback-oauth [--config <file>] [--strategy direct|proxied|library] [--print-tokens]';

export interface CliArgs {
  configPath?: string;
  strategy?: StrategyName;
  /** Print the unmasked credential as JSON */
  printTokens: boolean;
  help: boolean;
}

export class CliUsageError extends Error {}

function isStrategyName(value: string): value is StrategyName {
  return value === 'direct' || value === 'proxied' || value === 'library';
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = { printTokens: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--config' || arg === '-c') {
      const value = args[i + 1];
      if (value === undefined) {
        throw new CliUsageError('--config requires a file path');
      }
      result.configPath = value;
      i++; // Skip the next argument since we consumed it
    } else if (arg === '--strategy' || arg === '-s') {
      const value = args[i + 1];
      if (value === undefined || !isStrategyName(value)) {
        throw new CliUsageError('--strategy must be one of direct, proxied, library');
      }
      result.strategy = value;
      i++;
    } else if (arg === '--print-tokens') {
      result.printTokens = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

/**
 * Credential as printed to stdout; tokens masked unless asked otherwise
 */
export function describeCredential(credential: Credential, printTokens: boolean): Record<string, unknown> {
  if (printTokens) {
    return { ...credential };
  }
  const tokens = credential.tokens;
  return {
    kind: credential.kind,
    customToken: credential.kind === 'custom_token' ? mask(credential.customToken) : undefined,
    accessToken: mask(tokens?.access_token),
    idToken: tokens?.id_token ? 'present' : 'none',
    refreshToken: tokens?.refresh_token ? 'present' : 'none',
    expiresAt: tokens?.expires_at ? new Date(tokens.expires_at).toISOString() : undefined,
    user: credential.kind === 'custom_token' ? credential.user : undefined
  };
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.error(USAGE);
    return 2;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = await resolveFlowConfig({
    configPath: args.configPath,
    overrides: args.strategy ? { strategy: args.strategy } : undefined
  });
  const flow = new OAuthFlow({ config });

  const onInterrupt = (): void => {
    logger.warn('Interrupted, cancelling sign-in');
    flow.dispose().catch((error: unknown) => logger.error('Error during dispose:', error));
  };
  process.once('SIGINT', onInterrupt);

  try {
    const credential = await flow.signIn();
    console.log(JSON.stringify(describeCredential(credential, args.printTokens), null, 2));
    return 0;
  } catch (error) {
    console.error(getUserMessage(error));
    if (error instanceof LoopbackAuthError) {
      logger.debug(`${error.name}: ${error.message}`);
    }
    return 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Only run if this file is executed directly
if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(getUserMessage(error));
      logger.error('Fatal error:', error);
      process.exitCode = 1;
    }
  );
}
