import z from "zod";

const positiveInt = z.coerce.number().int().positive();

const envSchema = z
	.object({
		PORT: positiveInt.default(3000),
		VALKEY_HOST: z.string().min(1).default("localhost"),
		VALKEY_PORT: positiveInt.default(6379),
		/** If the server uses TLS, it must be enabled, otherwise connection attempts time out silently */
		VALKEY_USE_TLS: z
			.enum(["true", "false"])
			.default("false")
			.transform((value) => value === "true"),
		QUOTA_KEY_PREFIX: z.string().min(1).default("quota"),
		RATE_PER_SECOND: positiveInt.default(10),
		RATE_PER_MINUTE: positiveInt.default(100),
	})
	.transform((env) => ({
		port: env.PORT,
		valkey: {
			host: env.VALKEY_HOST,
			port: env.VALKEY_PORT,
			useTLS: env.VALKEY_USE_TLS,
		},
		quota: {
			keyPrefix: env.QUOTA_KEY_PREFIX,
			ratePerSecond: env.RATE_PER_SECOND,
			ratePerMinute: env.RATE_PER_MINUTE,
		},
	}));

export type Config = z.infer<typeof envSchema>;

/** Reads the server configuration from environment variables, throws ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	return envSchema.parse(env);
}
