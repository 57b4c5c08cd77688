export { GridEngine } from './gridEngine';
export type { GridGateway, OrderUpdateResult, TouchPrices } from './gridEngine';
export { HedgeGridBot } from './hedgeGridBot';
export type { BotStream, HedgeGridBotDeps, Stoppable, StreamFactory } from './hedgeGridBot';
export { buildBotSettings, buildGridSettings, buildProtectionSettings, buildSignalSettings } from './settings';
export type { BotSettings } from './settings';
export { classifyOrder, counterKeyFor, countersFromOrders } from './orderClassifier';
export * from './types';
