export { Article } from './Article.js';
export type { ArticleProps, ArticleChanges, NewArticle } from './Article.js';
export { Comment } from './Comment.js';
export type { CommentProps, NewComment } from './Comment.js';
export { User } from './User.js';
export type { UserProps, UserChanges, NewUser } from './User.js';
