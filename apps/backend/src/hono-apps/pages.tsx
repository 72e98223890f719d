import { v } from "@inkwell/validation";
import { contactSchema } from "@inkwell/validation/contact";
import { Hono } from "hono";

import { buildContactMessage } from "../lib/mail/contact";
import type { AppEnv } from "../lib/types";
import { formValues, toFieldErrors } from "../lib/utils/forms";
import { AboutPage, ContactPage } from "../views/pages";
import { renderPage } from "../views/render";

const pagesApp = new Hono<AppEnv>();

pagesApp.get("/about", (c) => renderPage(c, "About", <AboutPage />));

pagesApp.get("/contact", (c) =>
	renderPage(c, "Contact", <ContactPage sent={false} values={{}} errors={{}} />)
);

pagesApp.post("/contact", async (c) => {
	const body = await c.req.parseBody();
	const bodyValidation = v.safeParse(contactSchema, body);
	if (!bodyValidation.success) {
		return renderPage(
			c,
			"Contact",
			<ContactPage
				sent={false}
				values={formValues(body)}
				errors={toFieldErrors(bodyValidation.issues)}
			/>,
			400
		);
	}

	const { config, mailer } = c.var.app;
	const result = await mailer.send(buildContactMessage(config, bodyValidation.output));
	if (result.status !== "accepted") {
		throw new Error(`Contact message was not accepted: ${result.reason ?? "no reason given"}`);
	}

	return renderPage(c, "Contact", <ContactPage sent values={{}} errors={{}} />);
});

export { pagesApp };
