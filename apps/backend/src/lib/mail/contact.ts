import type { ContactInput } from "@inkwell/validation/contact";

import type { AppConfig } from "../../config";
import type { OutboundMessage } from "./types";

export const CONTACT_SUBJECT = "New 'contact me' message";

export function composeContactText(input: ContactInput) {
	return [
		CONTACT_SUBJECT,
		"",
		`From: ${input.name}`,
		`E-mail: ${input.email}`,
		`Phone: ${input.phone}`,
		`Message: ${input.message}`,
	].join("\n");
}

export function buildContactMessage(
	config: Pick<AppConfig, "smtp" | "contactRecipient">,
	input: ContactInput
): OutboundMessage {
	return {
		from: config.smtp.user,
		to: [config.contactRecipient],
		replyTo: input.email,
		subject: CONTACT_SUBJECT,
		text: composeContactText(input),
	};
}
