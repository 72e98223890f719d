import { v } from "@inkwell/validation";

export type FieldErrors = Partial<Record<string, string>>;
export type FormValues = Partial<Record<string, string>>;

/** First message per field, keyed by the field's dot path. */
export function toFieldErrors(issues: readonly v.BaseIssue<unknown>[]): FieldErrors {
	const errors: FieldErrors = {};
	for (const issue of issues) {
		const key = v.getDotPath(issue);
		if (key && !errors[key]) errors[key] = issue.message;
	}
	return errors;
}

export function formValues(body: Record<string, unknown>): FormValues {
	const values: FormValues = {};
	for (const [key, value] of Object.entries(body)) {
		if (typeof value === "string") values[key] = value;
	}
	return values;
}
