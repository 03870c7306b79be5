/**
 * Database row types. Mirror the Supabase table schemas in
 * supabase/migrations. Column names use snake_case to match PostgreSQL.
 */

export interface UserRow {
  id: string;
  email: string;
  username: string;
  password_hash: string;
  bio: string;
  image: string;
}

export interface ArticleRow {
  id: string;
  slug: string;
  title: string;
  description: string;
  body: string;
  author_id: string;
  created_at: string;
  updated_at: string;
}

/** Article row with its tags aggregated (articles_with_tags view). */
export interface ArticleWithTagsRow extends ArticleRow {
  tag_list: string[];
}

export interface CommentRow {
  id: string;
  body: string;
  author_id: string;
  article_id: string;
  created_at: string;
}

export interface FollowRow {
  follower_id: string;
  followee_id: string;
}

export interface FavoriteRow {
  user_id: string;
  article_id: string;
}
