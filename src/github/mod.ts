/**
 * GitHub integration
 * @module src/github
 */

export type { CommentService, PostedComment, PullRequestTarget } from "./types.ts";
export {
  GitHubCommentService,
  parseRepositoryName,
} from "./comment-service.ts";
export type {
  GitHubCommentServiceOptions,
  PullRequestCommentClient,
} from "./comment-service.ts";
export { DryRunCommentService } from "./dry-run-service.ts";
