import { CumulativeResetScope } from '../config';
import { ConversationMessage, ResponseFragment } from '../types';

interface Segment {
  buffer: string;
  sawPartial: boolean;
}

/**
 * Text accumulation for one message. A segment is a run of text fragments bounded by any
 * other fragment kind. Within a segment:
 * - partial fragments append,
 * - cumulative fragments replace the buffer, unless a partial was already seen,
 * - plain fragments append.
 *
 * With the `message` scope the partial-seen flag is not cleared at segment boundaries.
 */
export class TextAccumulator {
  private segments: Segment[] = [];
  private current?: Segment;
  private partialSeenInMessage = false;

  constructor(private readonly scope: CumulativeResetScope = 'segment') {}

  accept(fragment: ResponseFragment): void {
    if (fragment.kind !== 'text') {
      this.current = undefined;
      return;
    }

    if (!this.current) {
      this.current = { buffer: '', sawPartial: false };
      this.segments.push(this.current);
    }
    const segment = this.current;
    const partialSeen = this.scope === 'message' ? this.partialSeenInMessage : segment.sawPartial;

    if (fragment.isPartial) {
      segment.buffer += fragment.content;
      segment.sawPartial = true;
      this.partialSeenInMessage = true;
    } else if (fragment.isCumulative) {
      if (!partialSeen) segment.buffer = fragment.content;
    } else {
      segment.buffer += fragment.content;
    }
  }

  text(separator = ''): string {
    return this.segments
      .map((segment) => segment.buffer)
      .filter((buffer) => buffer.length > 0)
      .join(separator);
  }
}

export function renderFragments(
  fragments: ResponseFragment[],
  scope: CumulativeResetScope = 'segment',
  separator = ''
): string {
  const accumulator = new TextAccumulator(scope);
  for (const fragment of fragments) accumulator.accept(fragment);
  return accumulator.text(separator);
}

/**
 * Rendered text content of a message. Assistant text goes through the merge rule; user,
 * summary and boundary messages render their own content.
 */
export function renderText(message: ConversationMessage, scope: CumulativeResetScope = 'segment'): string {
  if (message.role === 'assistant') {
    return renderFragments(message.responses, scope);
  }
  const parts: string[] = [];
  for (const fragment of message.responses) {
    switch (fragment.kind) {
      case 'user-message':
      case 'compact-summary':
      case 'compact-boundary':
      case 'text':
        parts.push(fragment.content);
        break;
      case 'error':
        parts.push(fragment.message);
        break;
      default:
        break;
    }
  }
  return parts.join('\n');
}
