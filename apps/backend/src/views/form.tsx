import type { FC } from "hono/jsx";

type FieldProps = {
	name: string;
	label: string;
	type?: string;
	value?: string;
	error?: string;
	required?: boolean;
};

const controlClass = (error?: string) => (error ? "form-control is-invalid" : "form-control");

export const TextField: FC<FieldProps> = ({ name, label, type = "text", value, error, required = true }) => (
	<div class="mb-3">
		<label class="form-label" for={name}>
			{label}
		</label>
		<input
			class={controlClass(error)}
			id={name}
			name={name}
			type={type}
			value={value ?? ""}
			required={required}
		/>
		{error && <div class="invalid-feedback">{error}</div>}
	</div>
);

export const TextArea: FC<FieldProps & { rows?: number }> = ({ name, label, value, error, rows = 5 }) => (
	<div class="mb-3">
		<label class="form-label" for={name}>
			{label}
		</label>
		<textarea class={controlClass(error)} id={name} name={name} rows={rows} required>
			{value ?? ""}
		</textarea>
		{error && <div class="invalid-feedback">{error}</div>}
	</div>
);

export const SubmitButton: FC<{ label: string }> = ({ label }) => (
	<button class="btn btn-primary" type="submit">
		{label}
	</button>
);
