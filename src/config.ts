import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./utils/errors.js";

const AppConfigSchema = z.object({
	baseUrl: z.string().url(),
	token: z.string().min(1),
	channelId: z.string().min(1),
	getTimeoutMs: z.coerce.number().int().positive().default(10_000),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface LoadConfigOptions {
	/** Read instead of `process.env`; `.env` is not loaded when given */
	env?: NodeJS.ProcessEnv;
}

/** Env var → config key */
const ENV_KEYS: Record<string, keyof AppConfig> = {
	MATTERMOST_URL: "baseUrl",
	MATTERMOST_TOKEN: "token",
	MATTERMOST_CHANNEL_ID: "channelId",
	MATTERMOST_GET_TIMEOUT_MS: "getTimeoutMs",
};

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
	let env = options.env;
	if (!env) {
		dotenv.config();
		env = process.env;
	}

	const raw: Record<string, unknown> = {};
	for (const [name, key] of Object.entries(ENV_KEYS)) {
		const value = env[name];
		if (value) raw[key] = value;
	}

	const parsed = AppConfigSchema.safeParse(raw);
	if (!parsed.success) {
		const fields = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
		throw new ConfigError(`Invalid Mattermost config: ${fields}`, parsed.error);
	}

	return parsed.data;
}
