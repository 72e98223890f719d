import type { FC } from "hono/jsx";

import type { FieldErrors, FormValues } from "../lib/utils/forms";
import { SubmitButton, TextArea, TextField } from "./form";
import { PageHeader } from "./layout";

export const AboutPage: FC = () => (
	<>
		<PageHeader heading="About Me" subheading="This is what I do." />
		<p>
			Inkwell is a small blog. Posts are written by the site owner; anyone with an account can
			join the conversation underneath them.
		</p>
		<p>
			Questions, corrections or ideas for a post? Use the <a href="/contact">contact form</a>.
		</p>
	</>
);

type ContactPageProps = { sent: boolean; values: FormValues; errors: FieldErrors };

export const ContactPage: FC<ContactPageProps> = ({ sent, values, errors }) => (
	<>
		<PageHeader
			heading={sent ? "Successfully sent your message" : "Contact Me"}
			subheading={sent ? "Thanks for getting in touch." : "Have questions? I have answers."}
		/>
		{!sent && (
			<form method="post" action="/contact" novalidate>
				<TextField name="name" label="Name" value={values.name} error={errors.name} />
				<TextField name="email" label="Email Address" type="email" value={values.email} error={errors.email} />
				<TextField
					name="phone"
					label="Phone Number"
					type="tel"
					value={values.phone}
					error={errors.phone}
					required={false}
				/>
				<TextArea name="message" label="Message" value={values.message} error={errors.message} />
				<SubmitButton label="Send" />
			</form>
		)}
	</>
);

export const ErrorPage: FC<{ status: number; message: string }> = ({ status, message }) => (
	<>
		<PageHeader heading={String(status)} subheading={message} />
		<a href="/">Back to all posts</a>
	</>
);
