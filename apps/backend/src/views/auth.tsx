import type { FC } from "hono/jsx";

import type { FieldErrors, FormValues } from "../lib/utils/forms";
import { SubmitButton, TextField } from "./form";
import { PageHeader } from "./layout";

type AuthFormProps = { values: FormValues; errors: FieldErrors };

export const RegisterPage: FC<AuthFormProps> = ({ values, errors }) => (
	<>
		<PageHeader heading="Register" subheading="Start contributing to the blog!" />
		<form method="post" action="/register" novalidate>
			<TextField name="email" label="Email" type="email" value={values.email} error={errors.email} />
			<TextField name="password" label="Password" type="password" error={errors.password} />
			<TextField name="name" label="Name" value={values.name} error={errors.name} />
			<SubmitButton label="Sign Me Up!" />
		</form>
	</>
);

export const LoginPage: FC<AuthFormProps> = ({ values, errors }) => (
	<>
		<PageHeader heading="Log In" subheading="Welcome back!" />
		<form method="post" action="/login" novalidate>
			<TextField name="email" label="Email" type="email" value={values.email} error={errors.email} />
			<TextField name="password" label="Password" type="password" error={errors.password} />
			<SubmitButton label="Let Me In!" />
		</form>
	</>
);
