/**
 * Attribution
 *
 * Destination accounts post every issue and comment, so the original author,
 * date and source link travel in a footer appended to the body.
 */

import type { Comment, Identity, Issue } from './types.js';

export type IdentityLookup = ReadonlyMap<number, Identity>;

/**
 * How a source user is named in a footer: the mapped destination login,
 * else the display name, else the source username.
 */
export function attributionFor(identity: Identity): string {
  if (identity.destinationUsername) {
    return `@${identity.destinationUsername}`;
  }
  if (identity.fallbackName) {
    return identity.fallbackName;
  }
  return `@${identity.sourceUsername} (GitLab)`;
}

function lookup(identities: IdentityLookup, id: number): Identity {
  return identities.get(id) ?? { sourceId: id, sourceUsername: `user_${id}`, fallbackName: '' };
}

function footer(verb: 'created' | 'commented', who: string, createdAt: string, url: string): string {
  return `\n\n---\n*Originally ${verb} by ${who} on ${createdAt} in [GitLab](${url})*`;
}

export function formatIssueBody(issue: Issue, identities: IdentityLookup): string {
  const body = issue.body.trim() ? issue.body : '*Issue imported from GitLab*';
  const author = attributionFor(lookup(identities, issue.authorId));
  let text = body + footer('created', author, issue.createdAt, issue.sourceUrl);

  if (issue.assigneeIds.length > 0) {
    const assignees = issue.assigneeIds.map((id) => attributionFor(lookup(identities, id)));
    text += `\n*Assignees: ${assignees.join(', ')}*`;
  }
  return `${text}\n`;
}

export function formatCommentBody(comment: Comment, identities: IdentityLookup): string {
  const author = attributionFor(lookup(identities, comment.authorId));
  return comment.body + footer('commented', author, comment.createdAt, comment.sourceUrl);
}
