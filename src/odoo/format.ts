// This module turns raw Odoo records into the stable objects CRM tools return.

import type {
  ActivitySummary,
  LeadDetails,
  LeadSummary,
  NamedReference,
  OdooRecord,
  PartnerDetails,
  PartnerSummary,
  ProgramSummary,
  StageSummary,
  TeamSummary
} from '../types/domain.js';

export const LEAD_FIELDS = [
  'id',
  'name',
  'type',
  'contact_name',
  'partner_name',
  'email_from',
  'phone',
  'mobile',
  'expected_revenue',
  'probability',
  'priority',
  'create_date',
  'write_date',
  'date_deadline',
  'stage_id',
  'team_id',
  'user_id',
  'partner_id',
  'description'
];

export const LEAD_DETAIL_FIELDS = [
  ...LEAD_FIELDS,
  'website',
  'function',
  'street',
  'street2',
  'city',
  'zip',
  'date_open',
  'date_closed',
  'date_last_stage_update',
  'active',
  'color'
];

export const PARTNER_FIELDS = [
  'id',
  'name',
  'display_name',
  'email',
  'phone',
  'mobile',
  'website',
  'is_company',
  'customer_rank',
  'supplier_rank',
  'vat',
  'street',
  'street2',
  'city',
  'zip',
  'country_id',
  'state_id',
  'parent_id',
  'category_id',
  'create_date',
  'write_date',
  'active'
];

export const PARTNER_DETAIL_FIELDS = [
  ...PARTNER_FIELDS,
  'function',
  'title',
  'lang',
  'tz',
  'comment',
  'ref',
  'industry_id',
  'company_id'
];

// Odoo sends false for empty char, date, and relation fields.
export function readString(record: OdooRecord, field: string, fallback = ''): string {
  const value = record[field];
  return typeof value === 'string' ? value : fallback;
}

export function readNumber(record: OdooRecord, field: string, fallback = 0): number {
  const value = record[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function readBoolean(record: OdooRecord, field: string, fallback: boolean): boolean {
  const value = record[field];
  return typeof value === 'boolean' ? value : fallback;
}

// This helper maps a many2one pair [id, display_name] to a reference, and anything else to null.
export function many2one(value: unknown): NamedReference | null {
  if (Array.isArray(value) && value.length >= 2 && typeof value[0] === 'number' && typeof value[1] === 'string') {
    return { id: value[0], name: value[1] };
  }

  return null;
}

// x2many fields come back as plain id lists.
export function readIdList(record: OdooRecord, field: string): number[] {
  const value = record[field];
  return Array.isArray(value) ? value.filter((item): item is number => typeof item === 'number') : [];
}

export function formatLead(lead: OdooRecord): LeadSummary {
  return {
    id: readNumber(lead, 'id'),
    name: readString(lead, 'name'),
    type: readString(lead, 'type', 'lead'),
    contact_name: readString(lead, 'contact_name'),
    partner_name: readString(lead, 'partner_name'),
    email_from: readString(lead, 'email_from'),
    phone: readString(lead, 'phone'),
    mobile: readString(lead, 'mobile'),
    expected_revenue: readNumber(lead, 'expected_revenue'),
    probability: readNumber(lead, 'probability'),
    priority: readString(lead, 'priority', '0'),
    create_date: readString(lead, 'create_date'),
    write_date: readString(lead, 'write_date'),
    date_deadline: readString(lead, 'date_deadline'),
    stage: many2one(lead.stage_id),
    team: many2one(lead.team_id),
    user: many2one(lead.user_id),
    partner: many2one(lead.partner_id),
    description: readString(lead, 'description')
  };
}

export function formatLeadDetails(lead: OdooRecord): LeadDetails {
  return {
    ...formatLead(lead),
    website: readString(lead, 'website'),
    function: readString(lead, 'function'),
    street: readString(lead, 'street'),
    street2: readString(lead, 'street2'),
    city: readString(lead, 'city'),
    zip: readString(lead, 'zip'),
    date_open: readString(lead, 'date_open'),
    date_closed: readString(lead, 'date_closed'),
    date_last_stage_update: readString(lead, 'date_last_stage_update'),
    active: readBoolean(lead, 'active', true),
    color: readNumber(lead, 'color')
  };
}

export function formatPartner(partner: OdooRecord): PartnerSummary {
  return {
    id: readNumber(partner, 'id'),
    name: readString(partner, 'name'),
    display_name: readString(partner, 'display_name'),
    email: readString(partner, 'email'),
    phone: readString(partner, 'phone'),
    mobile: readString(partner, 'mobile'),
    website: readString(partner, 'website'),
    is_company: readBoolean(partner, 'is_company', false),
    customer_rank: readNumber(partner, 'customer_rank'),
    supplier_rank: readNumber(partner, 'supplier_rank'),
    vat: readString(partner, 'vat'),
    street: readString(partner, 'street'),
    street2: readString(partner, 'street2'),
    city: readString(partner, 'city'),
    zip: readString(partner, 'zip'),
    country: many2one(partner.country_id),
    state: many2one(partner.state_id),
    parent: many2one(partner.parent_id),
    category_ids: readIdList(partner, 'category_id'),
    create_date: readString(partner, 'create_date'),
    write_date: readString(partner, 'write_date'),
    active: readBoolean(partner, 'active', true)
  };
}

export function formatPartnerDetails(partner: OdooRecord): PartnerDetails {
  return {
    ...formatPartner(partner),
    function: readString(partner, 'function'),
    title: many2one(partner.title),
    lang: readString(partner, 'lang'),
    tz: readString(partner, 'tz'),
    comment: readString(partner, 'comment'),
    ref: readString(partner, 'ref'),
    industry: many2one(partner.industry_id),
    company: many2one(partner.company_id)
  };
}

export function formatStage(stage: OdooRecord): StageSummary {
  return {
    id: readNumber(stage, 'id'),
    name: readString(stage, 'name'),
    sequence: readNumber(stage, 'sequence'),
    fold: readBoolean(stage, 'fold', false),
    probability: readNumber(stage, 'probability'),
    team: many2one(stage.team_id)
  };
}

export function formatTeam(team: OdooRecord): TeamSummary {
  return {
    id: readNumber(team, 'id'),
    name: readString(team, 'name'),
    active: readBoolean(team, 'active', true),
    leader: many2one(team.user_id),
    member_count: readIdList(team, 'member_ids').length
  };
}

export function formatActivity(activity: OdooRecord): ActivitySummary {
  return {
    id: readNumber(activity, 'id'),
    type: many2one(activity.activity_type_id),
    summary: readString(activity, 'summary'),
    date_deadline: readString(activity, 'date_deadline'),
    state: readString(activity, 'state'),
    user: many2one(activity.user_id),
    create_date: readString(activity, 'create_date')
  };
}

// Programs are sold as product templates, so the price is the template's list price.
export function formatProgram(program: OdooRecord): ProgramSummary {
  return {
    id: readNumber(program, 'id'),
    name: readString(program, 'name'),
    active: readBoolean(program, 'active', true),
    price: readNumber(program, 'list_price'),
    category: many2one(program.categ_id)
  };
}

// Currency and percentage figures are reported with two decimals.
export function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}
