export {
  estimateKaiserOrder,
  assertKaiserSpecification,
  assertOrderLimits,
  kaiserBeta,
  kaiserRawOrder,
  toOdd,
} from './kaiser-order.js';
