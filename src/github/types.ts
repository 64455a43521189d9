/**
 * Source-hosting capability used by the lint report bot
 * @module src/github/types
 */

export interface PostedComment {
  id: number;
  url: string;
}

export interface CommentService {
  readonly name: string;
  /**
   * Create one new comment on a pull request.
   * @param repository - full name, "owner/name"
   */
  post(
    repository: string,
    pullNumber: number,
    body: string,
  ): Promise<PostedComment>;
}

export interface PullRequestTarget {
  repository: string;
  pullNumber: number;
}
