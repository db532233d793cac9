import { z } from 'zod';
import { RELATION_KINDS } from './constants';

// Derived fields (party, counts) are accepted but recomputed on load
export const LegislatorStubSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  url: z.string().url(),
  rawParty: z.string(),
  party: z.string().optional(),
});

export const FamilyRelationSchema = z.object({
  name: z.string().min(1),
  role: z.string(),
  relation: z.enum(RELATION_KINDS),
  party: z.string().nullable().optional(),
});

export const LegislatorRecordSchema = LegislatorStubSchema.extend({
  relations: z.array(FamilyRelationSchema),
  relationsCount: z.number().int().optional(),
  ancestorCount: z.number().int().optional(),
});

export const RosterFileSchema = z.array(LegislatorStubSchema);
export const RelationsFileSchema = z.array(LegislatorRecordSchema);

// Shape of the language model's tool input
export const RelationsPayloadSchema = z.object({
  relations: z.array(FamilyRelationSchema),
});
