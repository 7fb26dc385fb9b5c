import { promises as fs } from 'fs';
import path from 'path';
import { assertEndpointUrl, AuthorizationHints } from '../auth/authorizationUrl.js';
import { DEFAULT_ALLOWED_HOSTS } from '../auth/redirectValidator.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, isRecord } from '../auth/httpClient.js';
import { ConfigurationError } from '../errors/authErrors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Config');

export type StrategyName = 'direct' | 'proxied' | 'library';

const STRATEGIES: readonly StrategyName[] = ['direct', 'proxied', 'library'];

/**
 * Resolved flow configuration, injected into the strategy and orchestrator
 */
export interface FlowConfig {
  strategy: StrategyName;

  // OAuth client (direct and library strategies)
  clientId: string;
  clientSecret?: string;
  /** Platforms the client id is issued for; empty means every platform */
  platforms: readonly string[];
  scopes: readonly string[];
  hints: AuthorizationHints;

  // Provider endpoints
  authorizationEndpoint: string;
  tokenEndpoint: string;
  revocationEndpoint: string;
  /** Hosts an authorization URL may point at before it is given to the browser */
  allowedHosts: readonly string[];

  // Backend proxy (proxied strategy)
  backendUrl?: string;

  // Timing
  /** How long to wait for the browser redirect; 0 waits forever */
  redirectTimeoutMs: number;
  requestTimeoutMs: number;

  /** Shown on the loopback confirmation page */
  appName: string;
}

export type FlowConfigInput = Partial<FlowConfig>;

export interface ResolveConfigOptions {
  /** Highest precedence: values set in code */
  overrides?: FlowConfigInput;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** JSON file, lowest precedence before defaults */
  configPath?: string;
}

/**
 * Default configuration template
 */
export const DEFAULT_CONFIG: FlowConfig = {
  strategy: 'direct',
  clientId: '',
  platforms: [],
  scopes: ['openid', 'email', 'profile'],
  hints: { accessType: 'offline', prompt: 'consent' },
  authorizationEndpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
  tokenEndpoint: 'https://oauth2.googleapis.com/token',
  revocationEndpoint: 'https://oauth2.googleapis.com/revoke',
  allowedHosts: DEFAULT_ALLOWED_HOSTS,
  redirectTimeoutMs: 5 * 60 * 1000,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  appName: 'the application'
};

export const ENV_KEYS = {
  CLIENT_ID: 'LOOPBACK_OAUTH_CLIENT_ID',
  CLIENT_SECRET: 'LOOPBACK_OAUTH_CLIENT_SECRET',
  BACKEND_URL: 'LOOPBACK_OAUTH_BACKEND_URL',
  STRATEGY: 'LOOPBACK_OAUTH_STRATEGY',
  REDIRECT_TIMEOUT_MS: 'LOOPBACK_OAUTH_REDIRECT_TIMEOUT_MS',
  SCOPES: 'LOOPBACK_OAUTH_SCOPES',
  PLATFORMS: 'LOOPBACK_OAUTH_PLATFORMS'
} as const;

function invalid(message: string): ConfigurationError {
  return new ConfigurationError(message, 'invalid_setting');
}

function parseList(value: string): string[] {
  return value.split(/[\s,]+/).filter(Boolean);
}

function parseStrategy(value: unknown, source: string): StrategyName {
  const match = STRATEGIES.find((strategy) => strategy === value);
  if (!match) {
    throw invalid(`${source}: strategy must be one of ${STRATEGIES.join(', ')}, got "${String(value)}"`);
  }
  return match;
}

function parseTimeout(value: unknown, source: string): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 0) {
    throw invalid(`${source}: timeout must be a non-negative integer of milliseconds, got "${String(value)}"`);
  }
  return parsed;
}

function stringList(value: unknown, source: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalid(`${source} must be an array of strings`);
  }
  return value;
}

function optionalString(record: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalid(`${source}: "${key}" must be a string`);
  }
  return value;
}

/**
 * Read settings from the environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv): FlowConfigInput {
  const input: FlowConfigInput = {};
  const clientId = env[ENV_KEYS.CLIENT_ID];
  const clientSecret = env[ENV_KEYS.CLIENT_SECRET];
  const backendUrl = env[ENV_KEYS.BACKEND_URL];
  const strategy = env[ENV_KEYS.STRATEGY];
  const redirectTimeout = env[ENV_KEYS.REDIRECT_TIMEOUT_MS];
  const scopes = env[ENV_KEYS.SCOPES];
  const platforms = env[ENV_KEYS.PLATFORMS];

  if (clientId) input.clientId = clientId;
  if (clientSecret) input.clientSecret = clientSecret;
  if (backendUrl) input.backendUrl = backendUrl;
  if (strategy) input.strategy = parseStrategy(strategy, ENV_KEYS.STRATEGY);
  if (redirectTimeout) input.redirectTimeoutMs = parseTimeout(redirectTimeout, ENV_KEYS.REDIRECT_TIMEOUT_MS);
  if (scopes) input.scopes = parseList(scopes);
  if (platforms) input.platforms = parseList(platforms);

  return input;
}

/**
 * Load a JSON configuration file. Unknown keys are ignored.
 */
export async function loadConfigFile(configPath: string): Promise<FlowConfigInput> {
  const absolutePath = path.resolve(configPath);
  let raw: string;
  try {
    raw = await fs.readFile(absolutePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw invalid(`Cannot read config file ${absolutePath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw invalid(`Config file ${absolutePath} is not valid JSON: ${message}`);
  }
  if (!isRecord(parsed)) {
    throw invalid(`Config file ${absolutePath} must contain a JSON object`);
  }

  const record = parsed;
  const source = path.basename(absolutePath);
  const input: FlowConfigInput = {};

  if (record.strategy !== undefined) input.strategy = parseStrategy(record.strategy, source);
  if (record.scopes !== undefined) input.scopes = stringList(record.scopes, `${source}: "scopes"`);
  if (record.platforms !== undefined) input.platforms = stringList(record.platforms, `${source}: "platforms"`);
  if (record.allowedHosts !== undefined) input.allowedHosts = stringList(record.allowedHosts, `${source}: "allowedHosts"`);
  if (record.redirectTimeoutMs !== undefined) input.redirectTimeoutMs = parseTimeout(record.redirectTimeoutMs, source);
  if (record.requestTimeoutMs !== undefined) input.requestTimeoutMs = parseTimeout(record.requestTimeoutMs, source);

  const strings = ['clientId', 'clientSecret', 'authorizationEndpoint', 'tokenEndpoint', 'revocationEndpoint', 'backendUrl', 'appName'] as const;
  for (const key of strings) {
    const value = optionalString(record, key, source);
    if (value !== undefined) {
      input[key] = value;
    }
  }

  const hints = record.hints;
  if (hints !== undefined) {
    if (!isRecord(hints)) {
      throw invalid(`${source}: "hints" must be an object`);
    }
    const accessType = optionalString(hints, 'accessType', source);
    if (accessType !== undefined && accessType !== 'online' && accessType !== 'offline') {
      throw invalid(`${source}: "hints.accessType" must be "online" or "offline"`);
    }
    input.hints = {
      accessType,
      prompt: optionalString(hints, 'prompt', source),
      loginHint: optionalString(hints, 'loginHint', source)
    };
  }

  return input;
}

/**
 * Resolve configuration once: overrides > environment > config file > defaults.
 * The result is frozen; nothing reads global state per call afterwards.
 */
export async function resolveFlowConfig(options: ResolveConfigOptions = {}): Promise<Readonly<FlowConfig>> {
  const fromFile = options.configPath ? await loadConfigFile(options.configPath) : {};
  const fromEnv = configFromEnv(options.env ?? process.env);
  const overrides = options.overrides ?? {};

  const merged: FlowConfig = { ...DEFAULT_CONFIG };
  for (const layer of [fromFile, fromEnv, overrides]) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  assertEndpointUrl('authorizationEndpoint', merged.authorizationEndpoint);
  assertEndpointUrl('tokenEndpoint', merged.tokenEndpoint);
  assertEndpointUrl('revocationEndpoint', merged.revocationEndpoint);

  logger.debug('Resolved OAuth configuration', {
    strategy: merged.strategy,
    clientIdPresent: merged.clientId !== '',
    clientSecretPresent: Boolean(merged.clientSecret),
    backendUrl: merged.backendUrl ?? 'none',
    redirectTimeoutMs: merged.redirectTimeoutMs
  });

  return Object.freeze(merged);
}
