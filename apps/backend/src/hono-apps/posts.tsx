import { v } from "@inkwell/validation";
import { commentSchema, postSchema, type PostInput } from "@inkwell/validation/posts";
import { eq } from "drizzle-orm";
import { Hono, type Context } from "hono";

import { adminOnly } from "../auth/guards";
import type { DBInstance } from "../lib/db";
import { commentTable, postTable } from "../lib/db/schema";
import { flash } from "../lib/flash";
import type { AppEnv } from "../lib/types";
import { formatPostDate } from "../lib/utils/date";
import { isUniqueConstraintError } from "../lib/utils/errors";
import { type FieldErrors, type FormValues, formValues, toFieldErrors } from "../lib/utils/forms";
import { sanitizeRichText } from "../lib/utils/html";
import { IndexPage, PostFormPage, PostPage, type PostWithComments } from "../views/posts";
import { renderNotFound, renderPage } from "../views/render";

const DUPLICATE_TITLE = "A post with that title already exists.";
const authorColumns = { id: true, name: true, email: true } as const;

const postsApp = new Hono<AppEnv>();

postsApp.get("/", async (c) => {
	const posts = await c.var.app.db.query.postTable.findMany({
		with: { author: { columns: authorColumns } },
		orderBy: (t, { asc }) => [asc(t.id)],
	});
	return renderPage(c, "Home", <IndexPage posts={posts} identity={c.var.identity} />);
});

postsApp.get("/post/:id{[0-9]+}", async (c) => {
	const post = await loadPost(c.var.app.db, c.req.param("id"));
	if (!post) return renderNotFound(c);
	return renderPost(c, post);
});

postsApp.post("/post/:id{[0-9]+}", async (c) => {
	const identity = c.var.identity;
	if (identity.kind === "anonymous") {
		await flash(c, "You need to login or register to comment.");
		return c.redirect("/login");
	}

	const { db } = c.var.app;
	const postId = Number(c.req.param("id"));
	const body = await c.req.parseBody();
	const bodyValidation = v.safeParse(commentSchema, body);
	if (!bodyValidation.success) {
		const post = await loadPost(db, postId);
		if (!post) return renderNotFound(c);
		return renderPost(c, post, formValues(body), toFieldErrors(bodyValidation.issues), 400);
	}

	const created = await db.transaction(async (tx) => {
		const parent = await tx.query.postTable.findFirst({
			columns: { id: true },
			where: (t, { eq }) => eq(t.id, postId),
		});
		if (!parent) return false;

		await tx.insert(commentTable).values({
			text: sanitizeRichText(bodyValidation.output.comment),
			authorId: identity.user.id,
			postId: parent.id,
		});
		return true;
	});
	if (!created) return renderNotFound(c);

	const post = await loadPost(db, postId);
	if (!post) return renderNotFound(c);
	return renderPost(c, post);
});

postsApp.get(
	"/new-post",
	adminOnly((c) =>
		renderPage(c, "New Post", <PostFormPage action="/new-post" isEdit={false} values={{}} errors={{}} />)
	)
);

postsApp.post(
	"/new-post",
	adminOnly(async (c, admin) => {
		const body = await c.req.parseBody();
		const bodyValidation = v.safeParse(postSchema, body);
		if (!bodyValidation.success) {
			return renderPostForm(c, "/new-post", false, formValues(body), toFieldErrors(bodyValidation.issues));
		}

		const input = bodyValidation.output;
		try {
			await c.var.app.db.insert(postTable).values({
				...postFields(input),
				authorId: admin.id,
				date: formatPostDate(),
			});
		} catch (error) {
			if (isUniqueConstraintError(error)) {
				return renderPostForm(c, "/new-post", false, formValues(body), { title: DUPLICATE_TITLE });
			}
			throw error;
		}

		return c.redirect("/");
	})
);

postsApp.get(
	"/edit-post/:id{[0-9]+}",
	adminOnly(async (c) => {
		const post = await findPost(c.var.app.db, c.req.param("id"));
		if (!post) return renderNotFound(c);

		const values = {
			title: post.title,
			subtitle: post.subtitle,
			imgUrl: post.imgUrl,
			body: post.body,
		};
		return renderPostForm(c, `/edit-post/${post.id}`, true, values, {}, 200);
	})
);

postsApp.post(
	"/edit-post/:id{[0-9]+}",
	adminOnly(async (c) => {
		const { db } = c.var.app;
		const post = await findPost(db, c.req.param("id"));
		if (!post) return renderNotFound(c);

		const action = `/edit-post/${post.id}`;
		const body = await c.req.parseBody();
		const bodyValidation = v.safeParse(postSchema, body);
		if (!bodyValidation.success) {
			return renderPostForm(c, action, true, formValues(body), toFieldErrors(bodyValidation.issues));
		}

		// author and date stay as they were at creation
		try {
			await db.update(postTable).set(postFields(bodyValidation.output)).where(eq(postTable.id, post.id));
		} catch (error) {
			if (isUniqueConstraintError(error)) {
				return renderPostForm(c, action, true, formValues(body), { title: DUPLICATE_TITLE });
			}
			throw error;
		}

		return c.redirect(`/post/${post.id}`);
	})
);

postsApp.get(
	"/delete/:id{[0-9]+}",
	adminOnly(async (c) => {
		const post = await findPost(c.var.app.db, c.req.param("id"));
		if (!post) return renderNotFound(c);

		await c.var.app.db.transaction(async (tx) => {
			await tx.delete(commentTable).where(eq(commentTable.postId, post.id));
			await tx.delete(postTable).where(eq(postTable.id, post.id));
		});

		return c.redirect("/");
	})
);

function postFields(input: PostInput) {
	return {
		title: input.title,
		subtitle: input.subtitle,
		body: sanitizeRichText(input.body),
		imgUrl: input.imgUrl,
	};
}

function parseId(raw: string | number | undefined) {
	const id = Number(raw);
	return Number.isSafeInteger(id) && id > 0 ? id : null;
}

async function findPost(db: DBInstance, rawId: string | number | undefined) {
	const id = parseId(rawId);
	if (id === null) return undefined;
	return db.query.postTable.findFirst({ where: (t, { eq }) => eq(t.id, id) });
}

async function loadPost(
	db: DBInstance,
	rawId: string | number | undefined
): Promise<PostWithComments | undefined> {
	const id = parseId(rawId);
	if (id === null) return undefined;
	return db.query.postTable.findFirst({
		where: (t, { eq }) => eq(t.id, id),
		with: {
			author: { columns: authorColumns },
			comments: {
				with: { author: { columns: authorColumns } },
				orderBy: (t, { asc }) => [asc(t.id)],
			},
		},
	});
}

function renderPost(
	c: Context<AppEnv>,
	post: PostWithComments,
	values: FormValues = {},
	errors: FieldErrors = {},
	status: 200 | 400 = 200
) {
	return renderPage(
		c,
		post.title,
		<PostPage post={post} identity={c.var.identity} values={values} errors={errors} />,
		status
	);
}

function renderPostForm(
	c: Context<AppEnv>,
	action: string,
	isEdit: boolean,
	values: FormValues,
	errors: FieldErrors,
	status: 200 | 400 = 400
) {
	return renderPage(
		c,
		isEdit ? "Edit Post" : "New Post",
		<PostFormPage action={action} isEdit={isEdit} values={values} errors={errors} />,
		status
	);
}

export { postsApp };
