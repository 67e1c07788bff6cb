export type { PriceFeed } from './priceFeed.js';
export { PaperPriceFeed } from './paperPriceFeed.js';
