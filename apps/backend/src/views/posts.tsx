import type { FC } from "hono/jsx";
import { raw } from "hono/html";

import { isAdmin, type Identity } from "../auth/identity";
import type { CommentSelectModel, PostSelectModel, UserSelectModel } from "../lib/db";
import type { FieldErrors, FormValues } from "../lib/utils/forms";
import { gravatarUrl } from "../lib/utils/gravatar";
import { SubmitButton, TextArea, TextField } from "./form";
import { PageHeader } from "./layout";

type Author = Pick<UserSelectModel, "id" | "name" | "email">;

export type PostWithAuthor = PostSelectModel & { author: Author };
export type PostWithComments = PostWithAuthor & {
	comments: (CommentSelectModel & { author: Author })[];
};

const Byline: FC<{ post: PostWithAuthor }> = ({ post }) => (
	<p class="text-muted">
		Posted by {post.author.name} on {post.date}
	</p>
);

export const IndexPage: FC<{ posts: PostWithAuthor[]; identity: Identity }> = ({ posts, identity }) => (
	<>
		<PageHeader heading="Inkwell" subheading="A collection of random musings." />
		{posts.length === 0 && <p>Nothing has been posted yet.</p>}
		{posts.map((post) => (
			<article class="mb-4 pb-3 border-bottom">
				<a href={`/post/${post.id}`}>
					<h2>{post.title}</h2>
					<h3 class="h5 fw-light">{post.subtitle}</h3>
				</a>
				<Byline post={post} />
				{isAdmin(identity) && (
					<a class="text-danger" href={`/delete/${post.id}`}>
						Delete
					</a>
				)}
			</article>
		))}
		{isAdmin(identity) && (
			<a class="btn btn-primary" href="/new-post">
				Create New Post
			</a>
		)}
	</>
);

type PostPageProps = {
	post: PostWithComments;
	identity: Identity;
	values: FormValues;
	errors: FieldErrors;
};

export const PostPage: FC<PostPageProps> = ({ post, identity, values, errors }) => (
	<>
		<PageHeader heading={post.title} subheading={post.subtitle} imgUrl={post.imgUrl} />
		<Byline post={post} />
		<div class="mb-4">{raw(post.body)}</div>
		{isAdmin(identity) && (
			<p>
				<a class="btn btn-outline-primary me-2" href={`/edit-post/${post.id}`}>
					Edit Post
				</a>
				<a class="btn btn-outline-danger" href={`/delete/${post.id}`}>
					Delete Post
				</a>
			</p>
		)}
		<section class="mb-4">
			<h2 class="h4">Comments</h2>
			<ul class="list-unstyled">
				{post.comments.map((comment) => (
					<li class="d-flex mb-3">
						<img
							class="rounded-circle me-3"
							src={gravatarUrl(comment.author.email, 48)}
							width={48}
							height={48}
							alt=""
						/>
						<div>
							<div>{raw(comment.text)}</div>
							<small class="text-muted">{comment.author.name}</small>
						</div>
					</li>
				))}
			</ul>
			<form method="post" action={`/post/${post.id}`} novalidate>
				<TextArea name="comment" label="Comment" value={values.comment} error={errors.comment} rows={3} />
				<SubmitButton label="Submit Comment" />
			</form>
		</section>
	</>
);

type PostFormPageProps = {
	action: string;
	isEdit: boolean;
	values: FormValues;
	errors: FieldErrors;
};

export const PostFormPage: FC<PostFormPageProps> = ({ action, isEdit, values, errors }) => (
	<>
		<PageHeader
			heading={isEdit ? "Edit Post" : "New Post"}
			subheading="You're going to make a great blog post!"
		/>
		<form method="post" action={action} novalidate>
			<TextField name="title" label="Blog Post Title" value={values.title} error={errors.title} />
			<TextField name="subtitle" label="Subtitle" value={values.subtitle} error={errors.subtitle} />
			<TextField name="imgUrl" label="Blog Image URL" type="url" value={values.imgUrl} error={errors.imgUrl} />
			<TextArea name="body" label="Blog Content (HTML)" value={values.body} error={errors.body} rows={12} />
			<SubmitButton label="Submit Post" />
		</form>
	</>
);
