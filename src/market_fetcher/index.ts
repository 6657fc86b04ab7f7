/**
 * Market fetcher module: thin facade over market metadata and universe building.
 */
export { GammaMarketSource, type MarketSource, type GammaEvent, type BrokerMarket } from "../markets/fetch_markets";
export { buildUniverse, type UniverseResult } from "../markets/universe";
export { fetchBook, fetchBooks } from "../markets/clob_http";
