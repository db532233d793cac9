export type Party = 'Conservative' | 'Labour' | 'Liberal Democrat' | 'Other';

export type RelationKind =
  | 'father'
  | 'mother'
  | 'uncle'
  | 'aunt'
  | 'husband'
  | 'wife'
  | 'brother'
  | 'sister'
  | 'grandparent-or-other';

export interface LegislatorStub {
  id: number;
  name: string;
  url: string;
  rawParty: string;
  party: Party;
}

// Family member who was an MP, a local councillor or otherwise a politician
export interface FamilyRelation {
  name: string;
  role: string;
  relation: RelationKind;
  party?: string | null;
}

export interface LegislatorRecord extends LegislatorStub {
  relations: FamilyRelation[];
  relationsCount: number;
  ancestorCount: number;
}
