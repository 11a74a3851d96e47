import {
  boolean,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";

export const sectionVisibilityEnum = pgEnum("section_visibility", ["public", "authorized"]);

export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),
  googleSub: text("google_sub").notNull().unique(),
  email: text("email"),
  name: text("name"),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  lastLoginAt: timestamp("last_login_at"),
});

// `id` is the SHA-256 of the session token; the token itself is never stored.
export const sessions = pgTable(
  "sessions",
  {
    id: text("id").primaryKey(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    expiresAt: timestamp("expires_at").notNull(),
  },
  (table) => [index("sessions_user_id_idx").on(table.userId)]
);

export const entrypoints = pgTable("entrypoints", {
  key: text("key").primaryKey(),
  description: text("description"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const sections = pgTable(
  "sections",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    entrypointKey: text("entrypoint_key")
      .notNull()
      .references(() => entrypoints.key, { onDelete: "cascade" }),
    position: integer("position").notNull(),
    componentTag: text("component_tag").notNull(),
    componentContent: jsonb("component_content").notNull(),
    visibility: sectionVisibilityEnum("visibility").default("public").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("sections_entrypoint_position_idx").on(table.entrypointKey, table.position),
    index("sections_component_tag_idx").on(table.componentTag),
  ]
);

