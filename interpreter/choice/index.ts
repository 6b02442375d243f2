export { Sequence, isSequence } from './Sequence';
export { RandomSource } from './random';
export {
  ascending,
  descending,
  exactOrder,
  shuffledSet,
  pseudorandom,
  counterbalanced,
  createSequence,
  isChoiceName,
  CHOICE_NAMES
} from './generators';
export type { ChoiceName, CycleOptions, RandomOptions, ShuffledOptions } from './generators';
