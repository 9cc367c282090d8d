import type { DocCommentNode, DocTagNode } from '../../syntax.js';

// Block tags whose first word is an argument rather than text
const NAMED_TAGS = new Set(['param', 'throws', 'exception']);

interface PendingTag {
  kind: string;
  lines: string[];
}

/**
 * Splits a raw `/** ... *\/` block into its free-text description and its
 * block tags. The description ends at the first line that starts with `@`.
 */
export function parseJavadoc(raw: string): DocCommentNode {
  const body = raw.replace(/^\/\*\*/, '').replace(/\*\/$/, '');
  const lines = body.split(/\r?\n/).map(line => line.replace(/^\s*\*(?!\/)/, '').trim());

  const description: string[] = [];
  const blockTags: DocTagNode[] = [];
  let pending: PendingTag | null = null;

  for (const line of lines) {
    const tagMatch = /^@(\w+)(?:\s+(.*))?$/.exec(line);
    if (tagMatch) {
      if (pending) blockTags.push(buildTag(pending));
      pending = { kind: tagMatch[1], lines: [tagMatch[2] ?? ''] };
    } else if (pending) {
      pending.lines.push(line);
    } else {
      description.push(line);
    }
  }
  if (pending) blockTags.push(buildTag(pending));

  return { description: description.join('\n').trim(), blockTags };
}

function buildTag(pending: PendingTag): DocTagNode {
  const text = pending.lines.join('\n').trim();
  if (!NAMED_TAGS.has(pending.kind)) {
    return { kind: pending.kind, content: text };
  }

  const match = /^(\S+)\s*([\s\S]*)$/.exec(text);
  if (!match) {
    return { kind: pending.kind, content: '' };
  }
  return { kind: pending.kind, name: match[1], content: match[2].trim() };
}
