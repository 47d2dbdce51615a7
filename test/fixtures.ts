import type { Document } from '../src/core/types';

export const EXAMPLE_DOCS: Document[] = [
  { docId: 'd1', title: 'Cache', text: 'Cache stampede mitigation for INC-49217.' },
  { docId: 'd2', title: 'Guide', text: 'How to write clear documentation.' },
];

export const EXAMPLE_QUERY = 'INC-49217 cache stampede';

export const RUNBOOK_DOCS: Document[] = [
  { docId: 'r1', title: 'Failover', text: 'Database failover promotes a replica.' },
  { docId: 'r2', title: 'Paging', text: 'Pages escalate after fifteen minutes.' },
  { docId: 'r3', title: 'Freeze', text: 'Deploys are frozen during the close.' },
  { docId: 'r4', title: 'Limits', text: 'Rate limits apply per API key.' },
];
