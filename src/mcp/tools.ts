// This module implements the CRM tool handlers on top of the backend client and registers them in a fixed order.

import {
  LEAD_DETAIL_FIELDS,
  LEAD_FIELDS,
  PARTNER_DETAIL_FIELDS,
  PARTNER_FIELDS,
  formatActivity,
  formatLead,
  formatLeadDetails,
  formatPartner,
  formatPartnerDetails,
  formatProgram,
  formatStage,
  formatTeam,
  readNumber,
  roundTo2
} from '../odoo/format.js';
import { withBackendConnection } from '../odoo/runtime.js';
import type {
  BackendRpcClient,
  CrmDashboardStats,
  DomainOperator,
  LeadDetails,
  OdooDomain,
  OdooRecord,
  PartnerDetails
} from '../types/domain.js';
import type { JsonObject, JsonValue } from '../types/mcp.js';
import { BackendError, ToolExecutionError } from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';
import { sanitizeForLog } from '../utils/logger.js';
import { defineTool, type RegisteredTool } from './registry.js';
import {
  academicProgramsSchema,
  convertLeadSchema,
  createLeadSchema,
  createPartnerSchema,
  dashboardStatsSchema,
  getLeadActivitiesSchema,
  getLeadDetailsSchema,
  getPartnerDetailsSchema,
  listCrmStagesSchema,
  listCrmTeamsSchema,
  listLeadsSchema,
  listPartnersSchema,
  odooVersionSchema,
  updateLeadSchema,
  updatePartnerSchema
} from './tool-schemas.js';

const LEAD_MODEL = 'crm.lead';
const PARTNER_MODEL = 'res.partner';

// This helper appends one domain term only when the filter value was supplied.
function addTerm(domain: OdooDomain, field: string, operator: DomainOperator, value: JsonValue | undefined): void {
  if (value !== undefined) {
    domain.push([field, operator, value]);
  }
}

// This helper drops undefined entries so write payloads only carry the fields a caller set.
function definedValues(values: Record<string, JsonValue | undefined>): JsonObject {
  const target: JsonObject = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      target[key] = value;
    }
  }

  return target;
}

// This helper reads one record by id and raises a tool failure when the backend returns nothing.
async function readRecord(
  client: BackendRpcClient,
  model: string,
  label: string,
  id: number,
  fields: string[]
): Promise<OdooRecord> {
  const rows = await client.executeKw(model, 'read', [[id]], { fields });
  const record = Array.isArray(rows) ? rows.find(isJsonObject) : undefined;
  if (!record) {
    throw new ToolExecutionError(`${label} with ID ${id} not found`, { model, id });
  }

  return record;
}

async function readLeadDetails(client: BackendRpcClient, leadId: number): Promise<LeadDetails> {
  return formatLeadDetails(await readRecord(client, LEAD_MODEL, 'Lead', leadId, LEAD_DETAIL_FIELDS));
}

async function readPartnerDetails(client: BackendRpcClient, partnerId: number): Promise<PartnerDetails> {
  return formatPartnerDetails(await readRecord(client, PARTNER_MODEL, 'Partner', partnerId, PARTNER_DETAIL_FIELDS));
}

async function searchCount(client: BackendRpcClient, model: string, domain: OdooDomain): Promise<number> {
  const count = await client.executeKw(model, 'search_count', [domain]);
  if (typeof count !== 'number') {
    throw new BackendError(`search_count on ${model} did not return a number.`);
  }

  return count;
}

export const odooVersionTool = defineTool({
  name: 'odoo_version',
  description: 'Return the connected Odoo URL, database, and server version.',
  inputSchema: odooVersionSchema,
  async handler(context) {
    const version = await withBackendConnection(context.backend, context.logger, (client) => client.getServerVersion());
    return `Connected to: ${context.backend.url}\nDatabase: ${context.backend.database}\nVersion: ${version}`;
  }
});

export const listLeadsTool = defineTool({
  name: 'list_leads',
  description: 'List CRM leads and opportunities, newest first, filtered by partner, team, salesperson, stage, type, priority, or creation date.',
  inputSchema: listLeadsSchema,
  async handler(context, args) {
    const domain: OdooDomain = [];
    addTerm(domain, 'partner_id', '=', args.partner_id);
    addTerm(domain, 'team_id', '=', args.team_id);
    addTerm(domain, 'user_id', '=', args.user_id);
    addTerm(domain, 'stage_id', '=', args.stage_id);
    addTerm(domain, 'type', '=', args.type);
    addTerm(domain, 'priority', '=', args.priority);
    addTerm(domain, 'create_date', '>=', args.date_from);
    addTerm(domain, 'create_date', '<=', args.date_to);

    context.logger.debug({ event: 'crm_leads_query', domain: sanitizeForLog(domain), limit: args.limit }, 'crm_leads_query');

    const rows = await withBackendConnection(context.backend, context.logger, (client) =>
      client.searchRead(LEAD_MODEL, domain, LEAD_FIELDS, { limit: args.limit, order: 'create_date desc' })
    );
    return rows.map(formatLead);
  }
});

export const getLeadDetailsTool = defineTool({
  name: 'get_lead_details',
  description: 'Return one lead or opportunity by id, including address and lifecycle dates.',
  inputSchema: getLeadDetailsSchema,
  async handler(context, args) {
    return withBackendConnection(context.backend, context.logger, (client) => readLeadDetails(client, args.lead_id));
  }
});

export const createLeadTool = defineTool({
  name: 'create_lead',
  description: 'Create a new lead and return it as stored by Odoo.',
  inputSchema: createLeadSchema,
  async handler(context, args) {
    const values = definedValues({ ...args, type: 'lead' });

    return withBackendConnection(context.backend, context.logger, async (client) => {
      const leadId = await client.executeKw(LEAD_MODEL, 'create', [values]);
      if (typeof leadId !== 'number') {
        throw new BackendError('Odoo did not return an id for the created lead.');
      }

      context.logger.info({ event: 'crm_lead_created', leadId }, 'crm_lead_created');
      return readLeadDetails(client, leadId);
    });
  }
});

export const updateLeadTool = defineTool({
  name: 'update_lead',
  description: 'Update fields on an existing lead or opportunity and return the result.',
  inputSchema: updateLeadSchema,
  async handler(context, args) {
    const { lead_id: leadId, ...fields } = args;
    const values = definedValues(fields);
    if (Object.keys(values).length === 0) {
      throw new ToolExecutionError('No fields provided for update', { leadId });
    }

    return withBackendConnection(context.backend, context.logger, async (client) => {
      await client.executeKw(LEAD_MODEL, 'write', [[leadId], values]);
      context.logger.info({ event: 'crm_lead_updated', leadId, fields: Object.keys(values) }, 'crm_lead_updated');
      return readLeadDetails(client, leadId);
    });
  }
});

export const convertLeadTool = defineTool({
  name: 'convert_lead_to_opportunity',
  description: 'Turn a lead into an opportunity, optionally assigning a partner, salesperson, or team.',
  inputSchema: convertLeadSchema,
  async handler(context, args) {
    const { lead_id: leadId, ...assignments } = args;
    const values = definedValues({ ...assignments, type: 'opportunity' });

    return withBackendConnection(context.backend, context.logger, async (client) => {
      await client.executeKw(LEAD_MODEL, 'write', [[leadId], values]);
      context.logger.info({ event: 'crm_lead_converted', leadId }, 'crm_lead_converted');
      return readLeadDetails(client, leadId);
    });
  }
});

export const listPartnersTool = defineTool({
  name: 'list_partners',
  description: 'List contacts and companies by name, email, phone, company flag, ranks, category, or country.',
  inputSchema: listPartnersSchema,
  async handler(context, args) {
    const domain: OdooDomain = [];
    addTerm(domain, 'name', 'ilike', args.name);
    addTerm(domain, 'email', 'ilike', args.email);
    addTerm(domain, 'phone', 'ilike', args.phone);
    addTerm(domain, 'is_company', '=', args.is_company);
    addTerm(domain, 'customer_rank', '>=', args.customer_rank);
    addTerm(domain, 'supplier_rank', '>=', args.supplier_rank);
    addTerm(domain, 'category_id', 'in', args.category_id === undefined ? undefined : [args.category_id]);
    addTerm(domain, 'country_id', '=', args.country_id);

    const rows = await withBackendConnection(context.backend, context.logger, (client) =>
      client.searchRead(PARTNER_MODEL, domain, PARTNER_FIELDS, { limit: args.limit, order: 'name asc' })
    );
    return rows.map(formatPartner);
  }
});

export const getPartnerDetailsTool = defineTool({
  name: 'get_partner_details',
  description: 'Return one contact or company by id.',
  inputSchema: getPartnerDetailsSchema,
  async handler(context, args) {
    return withBackendConnection(context.backend, context.logger, (client) => readPartnerDetails(client, args.partner_id));
  }
});

export const createPartnerTool = defineTool({
  name: 'create_partner',
  description: 'Create a contact or company and return it as stored by Odoo.',
  inputSchema: createPartnerSchema,
  async handler(context, args) {
    const { category_ids: categoryIds, ...fields } = args;
    // (6, 0, ids) replaces the many2many set with exactly these tags.
    const categories = categoryIds && categoryIds.length > 0 ? [[6, 0, categoryIds]] : undefined;
    const values = definedValues({ ...fields, category_id: categories });

    return withBackendConnection(context.backend, context.logger, async (client) => {
      const partnerId = await client.executeKw(PARTNER_MODEL, 'create', [values]);
      if (typeof partnerId !== 'number') {
        throw new BackendError('Odoo did not return an id for the created partner.');
      }

      context.logger.info({ event: 'crm_partner_created', partnerId }, 'crm_partner_created');
      return readPartnerDetails(client, partnerId);
    });
  }
});

export const updatePartnerTool = defineTool({
  name: 'update_partner',
  description: 'Update fields on an existing contact or company and return the result.',
  inputSchema: updatePartnerSchema,
  async handler(context, args) {
    const { partner_id: partnerId, ...fields } = args;
    const values = definedValues(fields);
    if (Object.keys(values).length === 0) {
      throw new ToolExecutionError('No fields provided for update', { partnerId });
    }

    return withBackendConnection(context.backend, context.logger, async (client) => {
      await client.executeKw(PARTNER_MODEL, 'write', [[partnerId], values]);
      context.logger.info({ event: 'crm_partner_updated', partnerId, fields: Object.keys(values) }, 'crm_partner_updated');
      return readPartnerDetails(client, partnerId);
    });
  }
});

export const listCrmStagesTool = defineTool({
  name: 'list_crm_stages',
  description: 'List pipeline stages in sequence order, optionally for one sales team.',
  inputSchema: listCrmStagesSchema,
  async handler(context, args) {
    const domain: OdooDomain = [];
    addTerm(domain, 'team_id', '=', args.team_id);

    const rows = await withBackendConnection(context.backend, context.logger, (client) =>
      client.searchRead('crm.stage', domain, ['id', 'name', 'sequence', 'fold', 'team_id', 'probability'], {
        order: 'sequence asc'
      })
    );
    return rows.map(formatStage);
  }
});

export const listCrmTeamsTool = defineTool({
  name: 'list_crm_teams',
  description: 'List sales teams with their leader and member count.',
  inputSchema: listCrmTeamsSchema,
  async handler(context) {
    const rows = await withBackendConnection(context.backend, context.logger, (client) =>
      client.searchRead('crm.team', [], ['id', 'name', 'user_id', 'member_ids', 'active'], { order: 'name asc' })
    );
    return rows.map(formatTeam);
  }
});

export const getLeadActivitiesTool = defineTool({
  name: 'get_lead_activities',
  description: 'List scheduled activities attached to one lead or opportunity.',
  inputSchema: getLeadActivitiesSchema,
  async handler(context, args) {
    const rows = await withBackendConnection(context.backend, context.logger, (client) =>
      client.searchRead(
        'mail.activity',
        [
          ['res_model', '=', LEAD_MODEL],
          ['res_id', '=', args.lead_id]
        ],
        ['id', 'activity_type_id', 'summary', 'date_deadline', 'user_id', 'state', 'create_date'],
        { order: 'date_deadline desc' }
      )
    );
    return rows.map(formatActivity);
  }
});

export const academicProgramsTool = defineTool({
  name: 'get_academic_programs',
  description: 'List academic programs, which Odoo stores as product templates, optionally including archived ones.',
  inputSchema: academicProgramsSchema,
  async handler(context, args) {
    const domain: OdooDomain = [];
    if (args.active_only) {
      domain.push(['active', '=', true]);
    }

    const rows = await withBackendConnection(context.backend, context.logger, (client) =>
      client.searchRead('product.template', domain, ['id', 'name', 'active', 'list_price', 'categ_id'], {
        order: 'name asc'
      })
    );
    return rows.map(formatProgram);
  }
});

export const dashboardStatsTool = defineTool({
  name: 'get_crm_dashboard_stats',
  description: 'Summarize lead and opportunity counts, win rate, and expected revenue, optionally per team, salesperson, or period.',
  inputSchema: dashboardStatsSchema,
  async handler(context, args): Promise<CrmDashboardStats> {
    const base: OdooDomain = [];
    addTerm(base, 'team_id', '=', args.team_id);
    addTerm(base, 'user_id', '=', args.user_id);
    addTerm(base, 'create_date', '>=', args.date_from);
    addTerm(base, 'create_date', '<=', args.date_to);

    return withBackendConnection(context.backend, context.logger, async (client) => {
      const [leadsCount, opportunitiesCount, wonCount, lostCount, revenueRows] = await Promise.all([
        searchCount(client, LEAD_MODEL, [...base, ['type', '=', 'lead']]),
        searchCount(client, LEAD_MODEL, [...base, ['type', '=', 'opportunity']]),
        searchCount(client, LEAD_MODEL, [...base, ['type', '=', 'opportunity'], ['probability', '=', 100]]),
        searchCount(client, LEAD_MODEL, [
          ...base,
          ['type', '=', 'opportunity'],
          ['probability', '=', 0],
          ['active', '=', false]
        ]),
        client.searchRead(
          LEAD_MODEL,
          [...base, ['type', '=', 'opportunity'], ['expected_revenue', '>', 0]],
          ['expected_revenue', 'probability']
        )
      ]);

      let totalExpected = 0;
      let weighted = 0;
      for (const row of revenueRows) {
        const revenue = readNumber(row, 'expected_revenue');
        totalExpected += revenue;
        weighted += revenue * (readNumber(row, 'probability') / 100);
      }

      return {
        leads_count: leadsCount,
        opportunities_count: opportunitiesCount,
        won_count: wonCount,
        lost_count: lostCount,
        win_rate: roundTo2((wonCount / Math.max(opportunitiesCount, 1)) * 100),
        total_expected_revenue: roundTo2(totalExpected),
        weighted_revenue: roundTo2(weighted),
        active_pipeline: opportunitiesCount - wonCount - lostCount
      };
    });
  }
});

// Registration order is the order tools/list advertises.
export function buildCrmTools(): RegisteredTool[] {
  return [
    odooVersionTool,
    listLeadsTool,
    getLeadDetailsTool,
    createLeadTool,
    updateLeadTool,
    convertLeadTool,
    listPartnersTool,
    getPartnerDetailsTool,
    createPartnerTool,
    updatePartnerTool,
    listCrmStagesTool,
    listCrmTeamsTool,
    getLeadActivitiesTool,
    academicProgramsTool,
    dashboardStatsTool
  ];
}
