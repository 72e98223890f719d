import type { AppConfig } from "../../config";
import { SmtpOutboundTransport } from "./smtp-transport";
import type { OutboundTransport } from "./transport";

export type { OutboundTransport } from "./transport";
export type { OutboundDeliveryResult, OutboundMessage } from "./types";

export function createOutboundTransport(config: AppConfig): OutboundTransport {
	return new SmtpOutboundTransport(config.smtp);
}
