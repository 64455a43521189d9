/**
 * Comment service that prints instead of posting
 * @module src/github/dry-run-service
 */

import type { CommentService, PostedComment } from "./types.ts";

export class DryRunCommentService implements CommentService {
  readonly name = "dry-run";

  constructor(
    private readonly write: (text: string) => void = (text) =>
      console.log(text),
  ) {}

  post(
    repository: string,
    pullNumber: number,
    body: string,
  ): Promise<PostedComment> {
    this.write(`--- comment for ${repository}#${pullNumber} (dry run) ---\n${body}`);
    return Promise.resolve({ id: 0, url: "" });
  }
}
