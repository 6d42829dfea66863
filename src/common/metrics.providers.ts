import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const LEADS_CREATED_TOTAL = 'leads_created_total';
export const CLIENTS_RESOLVED_TOTAL = 'clients_resolved_total';
export const LEAD_DOCUMENTS_TOTAL = 'lead_documents_total';
export const LEAD_DOCUMENT_DURATION = 'lead_document_duration_seconds';
export const USERS_PROVISIONED_TOTAL = 'users_provisioned_total';
export const AGENT_CODE_FALLBACKS_TOTAL = 'agent_code_fallbacks_total';

export const leadMetricsProviders = [
  makeCounterProvider({
    name: LEADS_CREATED_TOTAL,
    help: 'Total number of leads created',
    labelNames: ['source'],
  }),
];

export const clientMetricsProviders = [
  makeCounterProvider({
    name: CLIENTS_RESOLVED_TOTAL,
    help: 'Client resolutions by outcome',
    labelNames: ['outcome'],
  }),
];

export const documentMetricsProviders = [
  makeCounterProvider({
    name: LEAD_DOCUMENTS_TOTAL,
    help: 'Lead PDF generation attempts by status',
    labelNames: ['status'],
  }),
  makeHistogramProvider({
    name: LEAD_DOCUMENT_DURATION,
    help: 'Duration of lead PDF render and upload in seconds',
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  }),
];

export const accountMetricsProviders = [
  makeCounterProvider({
    name: USERS_PROVISIONED_TOTAL,
    help: 'Users auto-created from identity tokens',
  }),
];

export const identifierMetricsProviders = [
  makeCounterProvider({
    name: AGENT_CODE_FALLBACKS_TOTAL,
    help: 'Agent codes issued through the time-derived fallback',
  }),
];
