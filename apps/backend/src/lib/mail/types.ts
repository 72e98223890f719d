export type OutboundMessage = {
	from: string;
	// Must be non-empty.
	to: string[];
	subject: string;
	// Plain text only; nothing on this site sends HTML mail.
	text: string;
	replyTo?: string;
};

export type OutboundDeliveryStatus =
	// Accepted by the relay for delivery.
	| "accepted"
	// The relay refused one or more recipients.
	| "rejected";

export type OutboundDeliveryResult = {
	status: OutboundDeliveryStatus;
	providerMessageId?: string;
	// Relay response when status !== "accepted".
	reason?: string;
};
