import type { OutboundDeliveryResult, OutboundMessage } from "./types";

export interface OutboundTransport {
	// Resolves once the relay has answered; connection and auth failures reject.
	// There is no retry.
	send(message: OutboundMessage): Promise<OutboundDeliveryResult>;
}
