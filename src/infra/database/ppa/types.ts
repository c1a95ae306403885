import type { Generated, ColumnType } from 'kysely';

import type {
  AncillaryType,
  ContractStatus,
  OfferStatus,
  QuoteStatus,
  VoltageLevel,
} from '../../../common/types/enums.js';

// TIMESTAMP columns come back as Date; DATE columns are kept as 'YYYY-MM-DD'
// strings (see the type parser in client.ts).
export type Timestamp = ColumnType<Date, Date | string, Date | string>;
// Database-defaulted TIMESTAMP column (optional on insert)
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;
export type DateString = string;

// Reference data
export interface Plans {
  id: Generated<number>;
  name: string;
}

export interface Agencies {
  id: Generated<number>;
  agency_number: string;
  name: string;
}

export interface Customers {
  id: Generated<number>;
  name: string;
  agency_id: number | null;
}

// Contracts
export interface Contracts {
  id: Generated<number>;
  customer_id: number;
  plan_id: number;
  supply_point_number: string;
  start_date: DateString;
  end_date: DateString;
  contract_power_kw: number | null;
  status: Generated<ContractStatus>;
  created_at: GeneratedTimestamp;
}

export interface AncillaryContracts {
  id: Generated<number>;
  contract_id: number;
  type: AncillaryType;
  unit_price: number | null;
}

// Re-contract estimates
export interface RecontractEstimates {
  id: Generated<number>;
  customer_id: number;
  plan_id: number;
  desired_quote_date: DateString;
  quote_effective_days: number;
  remarks: string | null;
  created_at: GeneratedTimestamp;
}

export interface RecontractSupplyPoints {
  id: Generated<number>;
  estimate_id: number;
  supply_point_number: string;
}

export interface RecontractPlants {
  id: Generated<number>;
  estimate_id: number;
  capacity_mw: number;
  ppa_unit_price_yen_per_kwh: number | null;
}

// PPA bundles (まとめ番号), projects (案件番号) and supply points
export interface PpaBundles {
  id: Generated<number>;
  customer_id: number;
  agency_id: number | null;
  plan_id: number;
  voltage: VoltageLevel;
  area: string;
  prev_supplier_plan: string | null;
  contract_start_date: DateString | null;
  quote_valid_days: number | null;
  requested_at: DateString | null;
  request_due_date: DateString | null;
  quote_status: Generated<QuoteStatus>;
  offer_status: Generated<OfferStatus>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface PpaProjects {
  id: Generated<number>;
  bundle_id: number;
  capacity_mw: number;
  ppa_unit_price_yen_per_kwh: number | null;
  created_at: GeneratedTimestamp;
}

export interface PpaSupplyPoints {
  id: Generated<number>;
  bundle_id: number;
  project_id: number | null;
  name: string;
  address: string | null;
  supply_point_number: string | null;
  contract_kw: number | null;
}

export interface PpaDatabase {
  plans: Plans;
  agencies: Agencies;
  customers: Customers;
  contracts: Contracts;
  ancillary_contracts: AncillaryContracts;
  recontract_estimates: RecontractEstimates;
  recontract_supply_points: RecontractSupplyPoints;
  recontract_plants: RecontractPlants;
  ppa_bundles: PpaBundles;
  ppa_projects: PpaProjects;
  ppa_supply_points: PpaSupplyPoints;
}

/** Tables created by schema.sql */
export const PPA_TABLES = [
  'plans',
  'agencies',
  'customers',
  'contracts',
  'ancillary_contracts',
  'recontract_estimates',
  'recontract_supply_points',
  'recontract_plants',
  'ppa_bundles',
  'ppa_projects',
  'ppa_supply_points',
] as const satisfies readonly (keyof PpaDatabase)[];
