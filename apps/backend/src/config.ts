import { v } from "@inkwell/validation";

const port = (fallback: string) =>
	v.optional(
		v.pipe(v.string(), v.transform(Number), v.integer(), v.minValue(1), v.maxValue(65535)),
		fallback
	);

const envSchema = v.object({
	SECRET_KEY: v.pipe(v.string(), v.nonEmpty()),
	DATABASE_URL: v.optional(v.pipe(v.string(), v.nonEmpty()), "file:blog.db"),
	DATABASE_AUTH_TOKEN: v.optional(v.string()),
	EMAIL: v.pipe(v.string(), v.email()),
	APP_KEY: v.pipe(v.string(), v.nonEmpty()),
	SMTP_HOST: v.optional(v.pipe(v.string(), v.nonEmpty()), "smtp.gmail.com"),
	SMTP_PORT: port("587"),
	CONTACT_RECIPIENT: v.optional(v.pipe(v.string(), v.email())),
	HOST: v.optional(v.pipe(v.string(), v.nonEmpty()), "0.0.0.0"),
	PORT: port("5000"),
	NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "development"),
});

export type AppConfig = {
	secretKey: string;
	databaseUrl: string;
	databaseAuthToken?: string;
	smtp: {
		host: string;
		port: number;
		user: string;
		password: string;
	};
	contactRecipient: string;
	host: string;
	port: number;
	secureCookies: boolean;
};

export class ConfigError extends Error {
	constructor(readonly keys: string[]) {
		super(`Invalid or missing configuration: ${keys.join(", ")}`);
		this.name = "ConfigError";
	}
}

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
	const result = v.safeParse(envSchema, env);
	if (!result.success) {
		const keys = new Set<string>();
		for (const issue of result.issues) keys.add(v.getDotPath(issue) ?? "(root)");
		throw new ConfigError([...keys]);
	}

	const out = result.output;
	return {
		secretKey: out.SECRET_KEY,
		databaseUrl: out.DATABASE_URL,
		databaseAuthToken: out.DATABASE_AUTH_TOKEN || undefined,
		smtp: {
			host: out.SMTP_HOST,
			port: out.SMTP_PORT,
			user: out.EMAIL,
			password: out.APP_KEY,
		},
		contactRecipient: out.CONTACT_RECIPIENT ?? out.EMAIL,
		host: out.HOST,
		port: out.PORT,
		secureCookies: out.NODE_ENV === "production",
	};
}
