export type { Broker, OrderStatusReport, PlaceOrderRequest, PlacementReport } from './interface.js';
export { getCosts, getFilledPrice, getHoldings } from './interface.js';
export { SimBroker } from './sim.js';
export { AlpacaBroker } from './alpacaPaper.js';
export { connectWithRetry } from './connect.js';
export { toOrderState, type BrokerVocabulary } from './statusMap.js';
