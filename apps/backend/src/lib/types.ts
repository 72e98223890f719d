import type { Identity } from "../auth/identity";
import type { AppConfig } from "../config";
import type { DBInstance } from "./db";
import type { OutboundTransport } from "./mail/transport";

/** Everything a request handler needs, built once at startup. */
export type AppContext = {
	config: AppConfig;
	db: DBInstance;
	mailer: OutboundTransport;
};

export type AppEnv = {
	Variables: {
		app: AppContext;
		identity: Identity;
	};
};
