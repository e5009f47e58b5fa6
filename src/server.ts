import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { loadConfig } from "./config";
import { createValkeyClient } from "./ValkeyClient";
import { ValkeyQuotaStore } from "./QuotaStores/ValkeyQuotaStore";
import { SingleLimiter } from "./Limiters/SingleLimiter";
import { CompositeLimiter } from "./Limiters/CompositeLimiter";
import { Period } from "./Limiters/consts";
import { throttle } from "./middleware";

const config = loadConfig();
const client = await createValkeyClient(config.valkey);
const store = new ValkeyQuotaStore(client, { keyPrefix: config.quota.keyPrefix });

// Aborted on shutdown, so requests waiting for the quota are released
const shutdown = new AbortController();
const limiterOpts = { signal: shutdown.signal, logger: console };

const limiter = new CompositeLimiter(
	new SingleLimiter(store, "server_per_second", config.quota.ratePerSecond, { ...limiterOpts, periodMs: Period.Second }),
	new SingleLimiter(store, "server_per_minute", config.quota.ratePerMinute, { ...limiterOpts, periodMs: Period.Minute })
);

const app = new Hono();

app.use("*", throttle(limiter, { logger: console }));

app.get("*", (c) => {
	return c.text("Hello Hono!");
});

const server = serve(
	{
		fetch: app.fetch,
		port: config.port,
	},
	(info) => {
		console.log(`Server is running on http://localhost:${info.port}`);
	}
);

process.once("SIGTERM", () => {
	shutdown.abort();
	server.close(() => client.close());
});
