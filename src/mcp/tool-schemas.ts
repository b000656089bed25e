// This module defines CRM tool argument contracts; the advertised JSON Schemas are generated from them.

import { z } from 'zod';

const recordIdSchema = z.number().int().positive();

// ISO date or datetime as Odoo compares it against create_date.
const dateBoundSchema = z.string().trim().min(1).max(40);

export const leadTypeSchema = z.enum(['lead', 'opportunity']);
export const prioritySchema = z.enum(['0', '1', '2', '3']);

export const odooVersionSchema = z.object({});

export const listLeadsSchema = z.object({
  partner_id: recordIdSchema.optional(),
  team_id: recordIdSchema.optional(),
  user_id: recordIdSchema.optional(),
  stage_id: recordIdSchema.optional(),
  type: leadTypeSchema.optional(),
  priority: prioritySchema.optional(),
  date_from: dateBoundSchema.optional(),
  date_to: dateBoundSchema.optional(),
  limit: z.number().int().min(1).max(1000).default(100)
});

export const getLeadDetailsSchema = z.object({
  lead_id: recordIdSchema
});

export const createLeadSchema = z.object({
  name: z.string().trim().min(1).max(500),
  contact_name: z.string().trim().min(1).optional(),
  email_from: z.string().trim().min(1).optional(),
  phone: z.string().trim().min(1).optional(),
  partner_name: z.string().trim().min(1).optional(),
  description: z.string().optional(),
  team_id: recordIdSchema.optional(),
  user_id: recordIdSchema.optional(),
  stage_id: recordIdSchema.optional(),
  expected_revenue: z.number().min(0).optional(),
  probability: z.number().min(0).max(100).optional()
});

export const updateLeadSchema = z.object({
  lead_id: recordIdSchema,
  name: z.string().trim().min(1).max(500).optional(),
  contact_name: z.string().optional(),
  email_from: z.string().optional(),
  phone: z.string().optional(),
  description: z.string().optional(),
  stage_id: recordIdSchema.optional(),
  user_id: recordIdSchema.optional(),
  team_id: recordIdSchema.optional(),
  expected_revenue: z.number().min(0).optional(),
  probability: z.number().min(0).max(100).optional(),
  priority: prioritySchema.optional()
});

export const convertLeadSchema = z.object({
  lead_id: recordIdSchema,
  partner_id: recordIdSchema.optional(),
  user_id: recordIdSchema.optional(),
  team_id: recordIdSchema.optional()
});

export const listPartnersSchema = z.object({
  name: z.string().trim().min(1).optional(),
  email: z.string().trim().min(1).optional(),
  phone: z.string().trim().min(1).optional(),
  is_company: z.boolean().optional(),
  customer_rank: z.number().int().min(0).optional(),
  supplier_rank: z.number().int().min(0).optional(),
  category_id: recordIdSchema.optional(),
  country_id: recordIdSchema.optional(),
  limit: z.number().int().min(1).max(1000).default(100)
});

export const getPartnerDetailsSchema = z.object({
  partner_id: recordIdSchema
});

const partnerFieldsSchema = {
  email: z.string().trim().min(1).optional(),
  phone: z.string().trim().min(1).optional(),
  mobile: z.string().trim().min(1).optional(),
  website: z.string().trim().min(1).optional(),
  vat: z.string().trim().min(1).optional(),
  street: z.string().trim().min(1).optional(),
  street2: z.string().trim().min(1).optional(),
  city: z.string().trim().min(1).optional(),
  zip: z.string().trim().min(1).optional(),
  country_id: recordIdSchema.optional(),
  state_id: recordIdSchema.optional()
};

export const createPartnerSchema = z.object({
  name: z.string().trim().min(1).max(500),
  ...partnerFieldsSchema,
  is_company: z.boolean().default(false),
  parent_id: recordIdSchema.optional(),
  customer_rank: z.number().int().min(0).default(0),
  supplier_rank: z.number().int().min(0).default(0),
  category_ids: z.array(recordIdSchema).max(100).optional()
});

export const updatePartnerSchema = z.object({
  partner_id: recordIdSchema,
  name: z.string().trim().min(1).max(500).optional(),
  ...partnerFieldsSchema,
  customer_rank: z.number().int().min(0).optional(),
  supplier_rank: z.number().int().min(0).optional(),
  active: z.boolean().optional()
});

export const listCrmStagesSchema = z.object({
  team_id: recordIdSchema.optional()
});

export const listCrmTeamsSchema = z.object({});

export const getLeadActivitiesSchema = z.object({
  lead_id: recordIdSchema
});

export const academicProgramsSchema = z.object({
  active_only: z.boolean().default(true)
});

export const dashboardStatsSchema = z.object({
  team_id: recordIdSchema.optional(),
  user_id: recordIdSchema.optional(),
  date_from: dateBoundSchema.optional(),
  date_to: dateBoundSchema.optional()
});
