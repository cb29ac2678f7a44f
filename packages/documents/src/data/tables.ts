/**
 * Static lookup tables shipped as JSON and checked once at module load.
 */

import { z } from 'zod';
import {
  BANK_TYPES,
  BRAZILIAN_REGIONS,
  BRAZILIAN_STATES,
  type AreaCodeInfo,
  type BankInfo,
  type BrazilianState,
} from '@brdocs/contracts';
import areaCodesJson from './area-codes.json' with { type: 'json' };
import cepRangesJson from './cep-ranges.json' with { type: 'json' };
import banksJson from './banks.json' with { type: 'json' };

const stateSchema = z.enum(BRAZILIAN_STATES);

const areaCodeSchema = z.object({
  ddd: z.string().regex(/^[1-9]\d$/),
  state: stateSchema,
  region: z.enum(BRAZILIAN_REGIONS),
});

const cepRangeSchema = z
  .object({
    state: stateSchema,
    start: z.string().regex(/^\d{8}$/),
    end: z.string().regex(/^\d{8}$/),
  })
  .transform((range) => ({ state: range.state, start: Number(range.start), end: Number(range.end) }));

const bankSchema = z.object({
  code: z.string().regex(/^\d{3}$/),
  name: z.string().min(1),
  type: z.enum(BANK_TYPES),
});

/**
 * Inclusive numeric CEP range assigned to a state
 */
export interface CepRange {
  state: BrazilianState;
  start: number;
  end: number;
}

/**
 * Area code (DDD) table, sorted by code.
 */
export const AREA_CODES: readonly AreaCodeInfo[] = z.array(areaCodeSchema).parse(areaCodesJson);

/**
 * Area code lookup by two-digit DDD
 */
export const AREA_CODE_MAP: ReadonlyMap<string, AreaCodeInfo> = new Map(
  AREA_CODES.map((entry) => [entry.ddd, entry]),
);

/**
 * CEP ranges, ascending and contiguous from 01000000 to 99999999.
 */
export const CEP_RANGES: readonly CepRange[] = z.array(cepRangeSchema).parse(cepRangesJson);

/**
 * Bank table keyed by three-digit COMPE code
 */
export const BANKS: ReadonlyMap<string, BankInfo> = new Map(
  z
    .array(bankSchema)
    .parse(banksJson)
    .map((bank) => [bank.code, bank]),
);
