export type { ILimiter, ICompositeLimiter } from "./Limiters/ILimiter";
export { SingleLimiter } from "./Limiters/SingleLimiter";
export { CompositeLimiter } from "./Limiters/CompositeLimiter";
export { RateLimitIntervalServerError } from "./Limiters/errors";
export { Period } from "./Limiters/consts";
export type { IQuotaStore, Quota, QuotaResult } from "./QuotaStores/IQuotaStore";
export { quotaSchema } from "./QuotaStores/IQuotaStore";
export { ValkeyQuotaStore, type QuotaScriptRunner } from "./QuotaStores/ValkeyQuotaStore";
export { InMemoryQuotaStore } from "./QuotaStores/InMemoryQuotaStore";
export { throttle } from "./middleware";
export { loadConfig, type Config } from "./config";
export { createValkeyClient } from "./ValkeyClient";
export type { Logger } from "./Logger";
