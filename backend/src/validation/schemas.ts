import { z } from 'zod';
import { INDUSTRIES } from '../types';
import { EXPORT_TABLES } from '../services/exportService';

const industry = z.enum(INDUSTRIES);
const integer = z.number().int().safe();
const id = z.string().uuid();

export const idParams = z.object({ id });
export const offerParams = z.object({ offerId: id });
export const requestParams = z.object({ requestId: id });

// ---- game / admin ----------------------------------------------------------

export const statusBody = z.object({
  status: z.enum(['setup', 'running', 'paused', 'ended']),
});

const teamInput = z.object({
  name: z.string().trim().min(1).max(100),
  username: z.string().trim().min(1).max(50),
  industry,
  password: z.string().min(4),
});

/** Either an explicit team list, or the bundled roster with one shared password. */
export const setupBody = z.union([
  z.object({ teams: z.array(teamInput).min(1) }),
  z.object({ roster: z.literal('default'), password: z.string().min(4) }),
]);

export const reallocateBody = z
  .object({
    min: integer.nonnegative().optional(),
    max: integer.nonnegative().optional(),
  })
  .default({});

export const balanceAdjustmentBody = z.object({
  team_id: id,
  delta: integer,
  reason: z.string(),
});

export const inventoryAdjustmentBody = z.object({
  team_id: id,
  industry,
  kind: z.enum(['raw_units', 'material_units']),
  delta: integer,
  reason: z.string(),
});

export const grantGiftBody = z.object({
  team_id: id,
  quantity: integer,
});

// ---- team commands ---------------------------------------------------------

export const produceBody = z.object({ quantity: integer });

export const productionQuery = z.object({
  quantity: z.coerce.number().int().default(1),
  limit: z.coerce.number().int().default(10),
});

export const createOfferBody = z.object({
  quantity: integer,
  unit_price: integer,
});

export const acceptOfferBody = z.object({ quantity: integer });

export const repriceOfferBody = z.object({ unit_price: integer });

export const offersQuery = z.object({
  industry: industry.optional(),
  exclude_own: z.enum(['true', 'false']).optional(),
});

export const createTradeRequestBody = z.object({
  counterparty_team_id: id,
  industry,
  quantity: integer,
  unit_price: integer,
  is_secret: z.boolean().default(false),
});

export const dealsQuery = z.object({
  limit: z.coerce.number().int().positive().max(200).default(20),
});

export const exportQuery = z.object({
  type: z.enum(EXPORT_TABLES).default('teams'),
});

export const rosterFile = z.array(
  z.object({
    name: z.string().min(1),
    username: z.string().min(1),
    industry,
  })
);
