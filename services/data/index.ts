export { TrialLog } from './TrialLog';
export type { TrialLogJSON } from './TrialLog';
export type { ITrialLog } from './ITrialLog';
