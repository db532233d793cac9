import { ANCESTOR_RELATIONS, PARTY_RULES } from './constants';
import type { FamilyRelation, LegislatorRecord, LegislatorStub, Party } from './types';

/**
 * Classify a raw party label. First matching rule wins, anything unmatched is 'Other'.
 */
export function classifyParty(rawParty: string): Party {
  const label = rawParty.toLowerCase();
  const rule = PARTY_RULES.find(({ keyword }) => label.includes(keyword));
  return rule ? rule.party : 'Other';
}

export function isAncestor(relation: FamilyRelation): boolean {
  return ANCESTOR_RELATIONS.has(relation.relation);
}

export function createStub(fields: Omit<LegislatorStub, 'party'>): LegislatorStub {
  return Object.freeze({
    id: fields.id,
    name: fields.name,
    url: fields.url,
    rawParty: fields.rawParty,
    party: classifyParty(fields.rawParty),
  });
}

export function createRecord(
  stub: Omit<LegislatorStub, 'party'>,
  relations: FamilyRelation[]
): LegislatorRecord {
  return {
    ...createStub(stub),
    relations,
    relationsCount: relations.length,
    ancestorCount: relations.filter(isAncestor).length,
  };
}

/**
 * Records keyed by legislator id. At most one record per id; insertion order is kept.
 */
export class ResultSet {
  private readonly records = new Map<number, LegislatorRecord>();

  constructor(initial: Iterable<LegislatorRecord> = []) {
    for (const record of initial) {
      this.add(record);
    }
  }

  get size(): number {
    return this.records.size;
  }

  has(id: number): boolean {
    return this.records.has(id);
  }

  add(record: LegislatorRecord): void {
    if (this.records.has(record.id)) {
      throw new Error(`Duplicate record for legislator id ${record.id}`);
    }
    this.records.set(record.id, record);
  }

  toArray(): LegislatorRecord[] {
    return Array.from(this.records.values());
  }
}
