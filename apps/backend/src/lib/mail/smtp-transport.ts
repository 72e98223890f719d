import nodemailer, { type Transporter } from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport";

import type { OutboundTransport } from "./transport";
import type { OutboundDeliveryResult, OutboundMessage } from "./types";

type SmtpOutboundTransportOptions = {
	host: string;
	port: number;
	user: string;
	password: string;
};

export class SmtpOutboundTransport implements OutboundTransport {
	private readonly transporter: Transporter<SMTPTransport.SentMessageInfo>;

	constructor(opts: SmtpOutboundTransportOptions) {
		// Plain connection upgraded with STARTTLS; refuse to send if the upgrade fails.
		this.transporter = nodemailer.createTransport({
			host: opts.host,
			port: opts.port,
			secure: false,
			requireTLS: true,
			auth: { user: opts.user, pass: opts.password },
		});
	}

	async send(message: OutboundMessage): Promise<OutboundDeliveryResult> {
		if (!message.to.length) throw new Error("OutboundMessage.to must not be empty");

		const info = await this.transporter.sendMail({
			from: message.from,
			to: message.to,
			replyTo: message.replyTo,
			subject: message.subject,
			text: message.text,
		});

		if (info.rejected.length) {
			return { status: "rejected", providerMessageId: info.messageId, reason: info.response };
		}
		return { status: "accepted", providerMessageId: info.messageId };
	}
}
