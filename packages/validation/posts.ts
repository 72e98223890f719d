import * as v from "valibot";

const line = (label: string) =>
	v.pipe(
		v.string(),
		v.trim(),
		v.nonEmpty(`${label} is required!`),
		v.maxLength(250, `${label} must be at most 250 characters.`)
	);

export const postSchema = v.object({
	title: line("Title"),
	subtitle: line("Subtitle"),
	imgUrl: v.pipe(
		v.string(),
		v.trim(),
		v.nonEmpty("Image URL is required!"),
		v.url("Image URL must be a valid URL."),
		v.maxLength(250, "Image URL must be at most 250 characters.")
	),
	body: v.pipe(v.string(), v.trim(), v.nonEmpty("Body is required!")),
});

export const commentSchema = v.object({
	comment: v.pipe(v.string(), v.trim(), v.nonEmpty("Comment is required!")),
});

export type PostInput = v.InferOutput<typeof postSchema>;
