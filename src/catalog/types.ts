import type { CatalogKind } from '../config/schema.js';

export type { CatalogKind };

interface CatalogEntryBase {
  name: string;
  url: string;
  description?: string;
  location?: string;
  image?: string;
  tags: string[];
}

export interface ProgramEntry extends CatalogEntryBase {
  kind: 'program';
  category: string;
}

export interface ExpertEntry extends CatalogEntryBase {
  kind: 'expert';
  specialty: string;
}

export interface InstitutionEntry extends CatalogEntryBase {
  kind: 'institution';
  focus: string;
}

export type CatalogEntry = ProgramEntry | ExpertEntry | InstitutionEntry;

// catalog.json の形。kind は出力しない
export interface CatalogDataset {
  programs: Omit<ProgramEntry, 'kind'>[];
  experts: Omit<ExpertEntry, 'kind'>[];
  institutions: Omit<InstitutionEntry, 'kind'>[];
}
