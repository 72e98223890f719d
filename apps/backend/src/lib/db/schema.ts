import { relations } from "drizzle-orm";
import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const userTable = sqliteTable("users", {
	id: integer().primaryKey({ autoIncrement: true }),
	email: text().notNull().unique(),
	// PHC string, or a legacy pbkdf2 digest until the next login upgrades it
	password: text().notNull(),
	name: text().notNull(),
});

export const postTable = sqliteTable("blog_posts", {
	id: integer().primaryKey({ autoIncrement: true }),
	authorId: integer("author_id")
		.notNull()
		.references(() => userTable.id),
	title: text().notNull().unique(),
	subtitle: text().notNull(),
	date: text().notNull(),
	body: text().notNull(),
	imgUrl: text("img_url").notNull(),
});

export const commentTable = sqliteTable(
	"comments",
	{
		id: integer().primaryKey({ autoIncrement: true }),
		authorId: integer("author_id")
			.notNull()
			.references(() => userTable.id),
		postId: integer("post_id")
			.notNull()
			.references(() => postTable.id, { onDelete: "cascade" }),
		text: text().notNull(),
	},
	(self) => [index("comments_post_id").on(self.postId)]
);

export const userRelations = relations(userTable, ({ many }) => ({
	posts: many(postTable),
	comments: many(commentTable),
}));

export const postRelations = relations(postTable, ({ one, many }) => ({
	author: one(userTable, { fields: [postTable.authorId], references: [userTable.id] }),
	comments: many(commentTable),
}));

export const commentRelations = relations(commentTable, ({ one }) => ({
	author: one(userTable, { fields: [commentTable.authorId], references: [userTable.id] }),
	post: one(postTable, { fields: [commentTable.postId], references: [postTable.id] }),
}));
