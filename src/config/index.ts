/**
 * Runtime configuration for the risk engine and the portfolio ledger.
 *
 * Values come from environment variables with defaults and are validated
 * against the JSON schemas before any component sees them.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { RiskParameters } from '../types/risk';
import { LedgerConfig } from '../types/portfolio';
import { ConfigurationError } from '../types/errors';
import { RiskParametersSchema } from '../schemas/risk-parameters';
import { LedgerConfigSchema } from '../schemas/ledger-config';

export type Environment = Record<string, string | undefined>;

/**
 * Stop at 1.5 ATR, target at 1.88x the stop distance
 */
export const DEFAULT_RISK_PARAMETERS: RiskParameters = {
  stopAtrMultiplier: 1.5,
  takeAtrMultiplier: 2.82,
  percentFallbackEnabled: true,
  stopFallbackPercent: 0.02,
  takeFallbackPercent: 0.0376,
  minStopDistance: 0,
  minTakeDistance: 0,
  riskPerTrade: 0.0025,
  perSymbolCap: 10000,
  maxPositionValuePct: 0.1,
  sessionCapPct: 0.5,
  minRewardRisk: 1.0
};

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  capitalChangeThreshold: 0.2,
  negligibleQuantity: 1e-8,
  reconciliationTolerance: 1.0,
  allowNegativeCash: true
};

const RISK_ENV_KEYS: Array<[keyof RiskParameters, string]> = [
  ['stopAtrMultiplier', 'RISK_STOP_ATR_MULTIPLIER'],
  ['takeAtrMultiplier', 'RISK_TAKE_ATR_MULTIPLIER'],
  ['percentFallbackEnabled', 'RISK_PERCENT_FALLBACK_ENABLED'],
  ['stopFallbackPercent', 'RISK_STOP_FALLBACK_PERCENT'],
  ['takeFallbackPercent', 'RISK_TAKE_FALLBACK_PERCENT'],
  ['minStopDistance', 'RISK_MIN_STOP_DISTANCE'],
  ['minTakeDistance', 'RISK_MIN_TAKE_DISTANCE'],
  ['riskPerTrade', 'RISK_PER_TRADE'],
  ['perSymbolCap', 'RISK_PER_SYMBOL_CAP'],
  ['maxPositionValuePct', 'RISK_MAX_POSITION_VALUE_PCT'],
  ['sessionCapPct', 'RISK_SESSION_CAP_PCT'],
  ['minRewardRisk', 'RISK_MIN_REWARD_RISK']
];

const LEDGER_ENV_KEYS: Array<[keyof LedgerConfig, string]> = [
  ['capitalChangeThreshold', 'LEDGER_CAPITAL_CHANGE_THRESHOLD'],
  ['negligibleQuantity', 'LEDGER_NEGLIGIBLE_QUANTITY'],
  ['reconciliationTolerance', 'LEDGER_RECONCILIATION_TOLERANCE'],
  ['allowNegativeCash', 'LEDGER_ALLOW_NEGATIVE_CASH']
];

const ajv = new Ajv({ allErrors: true });
const validateRiskParameters = ajv.compile(RiskParametersSchema);
const validateLedgerConfig = ajv.compile(LedgerConfigSchema);

/**
 * Parses an environment value into the default's type. Unparseable values are
 * passed through as strings so schema validation reports them.
 */
function parseEnvValue(raw: string | undefined, fallback: number | boolean): unknown {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = raw.trim();

  if (typeof fallback === 'boolean') {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;
    return value;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
}

function fieldOf(error: ErrorObject): string {
  if (error.instancePath) {
    return error.instancePath.replace(/^\//, '');
  }
  const missing: unknown = error.params.missingProperty ?? error.params.additionalProperty;
  return typeof missing === 'string' ? missing : '/';
}

function ensureValid<T>(validate: ValidateFunction<T>, candidate: unknown, label: string): T {
  if (validate(candidate)) {
    return candidate;
  }

  const errors = validate.errors ?? [];
  const fields = errors.map(fieldOf);
  const detail = errors
    .map(error => `${fieldOf(error)} ${error.message ?? 'is invalid'}`)
    .join('; ');
  throw new ConfigurationError(`Invalid ${label}: ${detail}`, fields);
}

/**
 * Copies defaults, then every override that is not undefined
 */
function mergeDefined(defaults: object, overrides: object): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(defaults)) {
    merged[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Merges overrides onto the defaults and validates the result
 *
 * @throws ConfigurationError listing every offending field
 */
export function resolveRiskParameters(overrides: Partial<RiskParameters> = {}): RiskParameters {
  return ensureValid(
    validateRiskParameters,
    mergeDefined(DEFAULT_RISK_PARAMETERS, overrides),
    'risk parameters'
  );
}

export function resolveLedgerConfig(overrides: Partial<LedgerConfig> = {}): LedgerConfig {
  return ensureValid(
    validateLedgerConfig,
    mergeDefined(DEFAULT_LEDGER_CONFIG, overrides),
    'ledger config'
  );
}

/**
 * Reads risk parameters from the environment
 */
export function loadRiskParameters(env: Environment = process.env): RiskParameters {
  const candidate: Record<string, unknown> = {};
  for (const [field, key] of RISK_ENV_KEYS) {
    candidate[field] = parseEnvValue(env[key], DEFAULT_RISK_PARAMETERS[field]);
  }
  return ensureValid(validateRiskParameters, candidate, 'risk parameters');
}

/**
 * Reads ledger settings from the environment
 */
export function loadLedgerConfig(env: Environment = process.env): LedgerConfig {
  const candidate: Record<string, unknown> = {};
  for (const [field, key] of LEDGER_ENV_KEYS) {
    candidate[field] = parseEnvValue(env[key], DEFAULT_LEDGER_CONFIG[field]);
  }
  return ensureValid(validateLedgerConfig, candidate, 'ledger config');
}
