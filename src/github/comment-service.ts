/**
 * GitHub pull request comments via Octokit
 * @module src/github/comment-service
 */

import { Octokit } from "@octokit/rest";
import {
  CommentServiceError,
  ConfigurationError,
  errorMessage,
  getErrorStatus,
} from "../errors.ts";
import { Logger } from "../logger/mod.ts";
import type { CommentService, PostedComment } from "./types.ts";

/**
 * The Octokit REST endpoints this service calls.
 */
export interface PullRequestCommentClient {
  rest: {
    repos: {
      get(params: { owner: string; repo: string }): Promise<{
        data: { full_name: string };
      }>;
    };
    pulls: {
      get(params: { owner: string; repo: string; pull_number: number }):
        Promise<{ data: { number: number; html_url: string } }>;
    };
    issues: {
      createComment(params: {
        owner: string;
        repo: string;
        issue_number: number;
        body: string;
      }): Promise<{ data: { id: number; html_url: string } }>;
    };
  };
}

export interface GitHubCommentServiceOptions {
  token: string;
  /** Pre-built client, used instead of constructing one from token */
  client?: PullRequestCommentClient;
}

const log = Logger.create("github:comments");

export class GitHubCommentService implements CommentService {
  readonly name = "github";
  private readonly client: PullRequestCommentClient;

  constructor(options: GitHubCommentServiceOptions) {
    this.client = options.client ?? new Octokit({ auth: options.token });
  }

  /**
   * Resolve the repository, then the pull request, then create the comment.
   * Every call posts a new comment; nothing is deduplicated.
   */
  async post(
    repository: string,
    pullNumber: number,
    body: string,
  ): Promise<PostedComment> {
    const { owner, repo } = parseRepositoryName(repository);

    const resolved = await this.call(
      "repository",
      `Repository ${repository} could not be resolved`,
      () => this.client.rest.repos.get({ owner, repo }),
    );
    log.debug("Resolved repository", { repository: resolved.data.full_name });

    const pull = await this.call(
      "pull-request",
      `Pull request #${pullNumber} could not be resolved in ${repository}`,
      () =>
        this.client.rest.pulls.get({ owner, repo, pull_number: pullNumber }),
    );
    log.debug("Resolved pull request", { url: pull.data.html_url });

    const comment = await this.call(
      "comment",
      `Comment could not be created on ${repository}#${pullNumber}`,
      () =>
        this.client.rest.issues.createComment({
          owner,
          repo,
          issue_number: pull.data.number,
          body,
        }),
    );

    log.info("Comment created", { url: comment.data.html_url });
    return { id: comment.data.id, url: comment.data.html_url };
  }

  private async call<T>(
    step: CommentServiceError["step"],
    message: string,
    request: () => Promise<T>,
  ): Promise<T> {
    try {
      return await request();
    } catch (error) {
      throw new CommentServiceError(
        `${message}: ${errorMessage(error)}`,
        step,
        getErrorStatus(error),
        error,
      );
    }
  }
}

/**
 * Split "owner/name" into its parts
 */
export function parseRepositoryName(
  repository: string,
): { owner: string; repo: string } {
  const match = /^([^/\s]+)\/([^/\s]+)$/.exec(repository.trim());
  if (!match || !match[1] || !match[2]) {
    throw new ConfigurationError(
      `Repository must be given as owner/name, got: ${repository}`,
      "REPO_NAME",
    );
  }
  return { owner: match[1], repo: match[2] };
}
