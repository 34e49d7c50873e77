export * from './errors';
export * from './utils';
export {
  paginationSchema,
  idSchema,
  isoDateSchema,
  positiveAmountSchema,
  assertValidated,
  parseInput,
} from './validation';
