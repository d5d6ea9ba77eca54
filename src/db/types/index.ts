import type { ColumnType, Generated } from 'kysely';

// Absent connector / interface dimensions are stored as '' so that the
// unique keys below cover them (MySQL lets NULLs repeat in unique indexes).

export interface LabelsTable {
  id: Generated<number>;
  namespace: string;
  label_key: string;
  default_locale: string;
  default_text: string;
  created_at: ColumnType<Date, Date | undefined, never>;
  updated_at: ColumnType<Date, Date | undefined, Date>;
}

export interface LocalizedLabelsTable {
  id: Generated<number>;
  label_id: number;
  locale: string;
  connector_type: string;
  interface_type: string;
  // JSON array of pattern strings; mysql2 hands back the parsed value
  alternatives: ColumnType<unknown, string, string>;
  validated: ColumnType<number, number, number>;
  updated_at: ColumnType<Date, Date | undefined, Date>;
}

export interface LabelUsagesTable {
  label_id: number;
  locale: string;
  connector_type: string;
  interface_type: string;
  use_count: number;
  last_used_at: Date;
}

export interface DB {
  labels: LabelsTable;
  localized_labels: LocalizedLabelsTable;
  label_usages: LabelUsagesTable;
}
