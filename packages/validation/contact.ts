import * as v from "valibot";

export const contactSchema = v.object({
	name: v.pipe(v.string(), v.trim(), v.nonEmpty("Name is required!")),
	email: v.pipe(v.string(), v.trim(), v.email("Invalid email address!")),
	// optional on the form, but always present as a field
	phone: v.pipe(v.string(), v.trim()),
	message: v.pipe(v.string(), v.trim(), v.nonEmpty("Message is required!")),
});

export type ContactInput = v.InferOutput<typeof contactSchema>;
