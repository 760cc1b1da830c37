export {
  addressSchema,
  poolNameSchema,
  assetClassSchema,
  externalIdSchema,
  addPoolInputSchema,
  poolRecordSchema,
} from './pool-registry-input.js';
export type {
  AddPoolInput,
  ParsedAddPoolInput,
  UpdatePoolInput,
} from './pool-registry-input.js';
