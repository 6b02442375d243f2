export { ExperimentController } from './ExperimentController';
export { HeadlessController } from './HeadlessController';
export type { HeadlessControllerOptions, StopReason } from './HeadlessController';
export { validateParadigm } from './validate';
export type {
  ContextListingEntry,
  ControllerOptions,
  ControllerState,
  ExperimentModel,
  RefreshOptions
} from './types';
