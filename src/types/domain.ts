// This file defines the CRM backend contract consumed by tool handlers and the shapes tools return.

import type { JsonValue } from './mcp.js';

export type DomainOperator = '=' | '!=' | '>' | '>=' | '<' | '<=' | 'like' | 'ilike' | 'in' | 'not in';
export type DomainTerm = [field: string, operator: DomainOperator, value: JsonValue];
export type OdooDomain = Array<DomainTerm | '&' | '|' | '!'>;

// Raw record as returned by search_read/read; field values are untyped until formatted.
export type OdooRecord = Record<string, unknown>;

export interface SearchReadOptions {
  limit?: number;
  offset?: number;
  order?: string;
}

// This interface is the only surface tool handlers use to reach the CRM backend.
export interface BackendRpcClient {
  readonly url: string;
  readonly database: string;
  readonly isConnected: boolean;
  connect(): Promise<void>;
  searchRead(model: string, domain: OdooDomain, fields: string[], options?: SearchReadOptions): Promise<OdooRecord[]>;
  executeKw(model: string, method: string, args: unknown[], kwargs?: Record<string, unknown>): Promise<unknown>;
  getServerVersion(): Promise<string>;
}

export interface BackendClientConfig {
  url: string;
  database: string;
  username: string;
  password: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

// The shapes below are type aliases rather than interfaces so they stay assignable to JsonValue.
export type NamedReference = {
  id: number;
  name: string;
};

export type LeadSummary = {
  id: number;
  name: string;
  type: string;
  contact_name: string;
  partner_name: string;
  email_from: string;
  phone: string;
  mobile: string;
  expected_revenue: number;
  probability: number;
  priority: string;
  create_date: string;
  write_date: string;
  date_deadline: string;
  stage: NamedReference | null;
  team: NamedReference | null;
  user: NamedReference | null;
  partner: NamedReference | null;
  description: string;
};

export type LeadDetails = LeadSummary & {
  website: string;
  function: string;
  street: string;
  street2: string;
  city: string;
  zip: string;
  date_open: string;
  date_closed: string;
  date_last_stage_update: string;
  active: boolean;
  color: number;
};

export type PartnerSummary = {
  id: number;
  name: string;
  display_name: string;
  email: string;
  phone: string;
  mobile: string;
  website: string;
  is_company: boolean;
  customer_rank: number;
  supplier_rank: number;
  vat: string;
  street: string;
  street2: string;
  city: string;
  zip: string;
  country: NamedReference | null;
  state: NamedReference | null;
  parent: NamedReference | null;
  category_ids: number[];
  create_date: string;
  write_date: string;
  active: boolean;
};

export type PartnerDetails = PartnerSummary & {
  function: string;
  title: NamedReference | null;
  lang: string;
  tz: string;
  comment: string;
  ref: string;
  industry: NamedReference | null;
  company: NamedReference | null;
};

export type ProgramSummary = {
  id: number;
  name: string;
  active: boolean;
  price: number;
  category: NamedReference | null;
};

export type StageSummary = {
  id: number;
  name: string;
  sequence: number;
  fold: boolean;
  probability: number;
  team: NamedReference | null;
};

export type TeamSummary = {
  id: number;
  name: string;
  active: boolean;
  leader: NamedReference | null;
  member_count: number;
};

export type ActivitySummary = {
  id: number;
  type: NamedReference | null;
  summary: string;
  date_deadline: string;
  state: string;
  user: NamedReference | null;
  create_date: string;
};

export type CrmDashboardStats = {
  leads_count: number;
  opportunities_count: number;
  won_count: number;
  lost_count: number;
  win_rate: number;
  total_expected_revenue: number;
  weighted_revenue: number;
  active_pipeline: number;
};
