/**
 * JSON Schema for risk engine parameters.
 */

import { JSONSchemaType } from 'ajv';
import { RiskParameters } from '../types/risk';

const positive = { type: 'number', exclusiveMinimum: 0 } as const;
const nonNegative = { type: 'number', minimum: 0 } as const;
const fraction = { type: 'number', exclusiveMinimum: 0, maximum: 1 } as const;

export const RiskParametersSchema: JSONSchemaType<RiskParameters> = {
  type: 'object',
  required: [
    'stopAtrMultiplier',
    'takeAtrMultiplier',
    'percentFallbackEnabled',
    'stopFallbackPercent',
    'takeFallbackPercent',
    'minStopDistance',
    'minTakeDistance',
    'riskPerTrade',
    'perSymbolCap',
    'maxPositionValuePct',
    'sessionCapPct',
    'minRewardRisk'
  ],
  properties: {
    stopAtrMultiplier: positive,
    takeAtrMultiplier: positive,
    percentFallbackEnabled: { type: 'boolean' },
    stopFallbackPercent: fraction,
    takeFallbackPercent: fraction,
    minStopDistance: nonNegative,
    minTakeDistance: nonNegative,
    riskPerTrade: fraction,
    perSymbolCap: nonNegative,
    maxPositionValuePct: fraction,
    sessionCapPct: fraction,
    minRewardRisk: nonNegative
  },
  additionalProperties: false
};
