import * as v from "valibot";

const emailField = v.pipe(
	v.string(),
	v.trim(),
	v.nonEmpty("Email is required!"),
	v.email("Invalid email address!"),
	v.toLowerCase()
);

export const registerSchema = v.object({
	email: emailField,
	password: v.pipe(v.string(), v.nonEmpty("Password is required!")),
	name: v.pipe(
		v.string(),
		v.trim(),
		v.nonEmpty("Name is required!"),
		v.maxLength(100, "Name must be at most 100 characters.")
	),
});

export const loginSchema = v.object({
	email: emailField,
	password: v.pipe(v.string(), v.nonEmpty("Password is required!")),
});
