import { GlideClient } from "@valkey/valkey-glide";
import type { Config } from "./config";

// Check `GlideClientConfiguration` for additional options.
export function createValkeyClient(config: Config["valkey"]): Promise<GlideClient> {
	return GlideClient.createClient({
		addresses: [{ host: config.host, port: config.port }],
		useTLS: config.useTLS,
		clientName: "blocking_rate_limiters",
	});
}
