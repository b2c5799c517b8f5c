import { baselineChecklist } from './baseline.js';
import { insecureServicesChecklist } from './insecureServices.js';
import type { Checklist } from './types.js';

export const CHECKLISTS: Record<string, Checklist> = {
  [baselineChecklist.id]: baselineChecklist,
  [insecureServicesChecklist.id]: insecureServicesChecklist,
};

export { baselineChecklist, BASELINE_CAPABILITIES } from './baseline.js';
export { insecureServicesChecklist, RISKY_SERVICES } from './insecureServices.js';
export { resolveIdentity, UNKNOWN_IDENTITY } from './identity.js';
export { describeScope, parseVpcList } from './types.js';
export type { Checklist, Scope } from './types.js';
