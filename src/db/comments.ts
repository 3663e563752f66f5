import { v4 as uuid } from 'uuid';
import { getDb, now, withTransaction } from './client.js';
import { emitEvent } from './events.js';
import { requireTask } from './tasks.js';
import { InvalidInputError } from '../errors.js';
import { isAuthorRole, type AuthorRole, type Comment } from './types.js';

interface CommentRow {
  id: string;
  task_id: string;
  author_role: string;
  content: string;
  created_at: string;
}

function toComment(row: CommentRow): Comment {
  return { ...row, author_role: isAuthorRole(row.author_role) ? row.author_role : 'human' };
}

export function addComment(taskId: string, authorRole: string, content: string): Comment {
  if (!isAuthorRole(authorRole)) {
    throw new InvalidInputError(`Unknown author role '${authorRole}'`);
  }
  if (!content.trim()) {
    throw new InvalidInputError('Comment content is required');
  }
  const role: AuthorRole = authorRole;

  return withTransaction(() => {
    requireTask(taskId);
    const db = getDb();
    const comment: Comment = {
      id: uuid(),
      task_id: taskId,
      author_role: role,
      content,
      created_at: now(),
    };

    db.prepare(`
      INSERT INTO comments (id, task_id, author_role, content, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(comment.id, comment.task_id, comment.author_role, comment.content, comment.created_at);

    emitEvent('comment_added', { comment });
    return comment;
  });
}

/** The thread in the order it was written. */
export function getComments(taskId: string): Comment[] {
  const db = getDb();
  return db.prepare<[string], CommentRow>(
    'SELECT * FROM comments WHERE task_id = ? ORDER BY created_at ASC, rowid ASC'
  ).all(taskId).map(toComment);
}
