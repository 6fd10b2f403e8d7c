export { FederationService } from './federation.service';
export { compareSkills, sortSkills } from './sort';
export type { FederationServiceOptions } from './types';
