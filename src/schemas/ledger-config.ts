/**
 * JSON Schema for portfolio ledger settings.
 */

import { JSONSchemaType } from 'ajv';
import { LedgerConfig } from '../types/portfolio';

export const LedgerConfigSchema: JSONSchemaType<LedgerConfig> = {
  type: 'object',
  required: ['capitalChangeThreshold', 'negligibleQuantity', 'reconciliationTolerance', 'allowNegativeCash'],
  properties: {
    capitalChangeThreshold: { type: 'number', exclusiveMinimum: 0 },
    negligibleQuantity: { type: 'number', exclusiveMinimum: 0 },
    reconciliationTolerance: { type: 'number', exclusiveMinimum: 0 },
    allowNegativeCash: { type: 'boolean' }
  },
  additionalProperties: false
};
