import { describe, expect, it } from 'vitest';

import { buildThreadTranscript, withThreadHistory } from '../src/control/thread-context.js';
import type { HistoryMessage } from '../src/shared/protocol.js';

const history: HistoryMessage[] = [
  { messageId: '1.0', text: '<@UBOT> the deploy script hangs', userId: 'U1', fromSelf: false },
  { messageId: '1.1', text: 'Which environment?', fromSelf: true },
  { messageId: '1.2', text: 'staging', userId: 'U2', fromSelf: false },
  { messageId: '1.3', text: '   ', userId: 'U1', fromSelf: false },
  { messageId: '1.4', text: 'please fix', userId: 'U1', fromSelf: false },
];

describe('thread transcript', () => {
  it('lists earlier messages without the one being answered', () => {
    expect(buildThreadTranscript(history, { currentMessageId: '1.4', allowedUsers: [] })).toBe(
      '[User] the deploy script hangs\n[relaybot] Which environment?\n[User] staging',
    );
  });

  it('leaves out users outside the allow-list', () => {
    expect(buildThreadTranscript(history, { currentMessageId: '1.4', allowedUsers: ['U1'] })).toBe(
      '[User] the deploy script hangs\n[relaybot] Which environment?',
    );
  });

  it('keeps the most recent messages', () => {
    expect(buildThreadTranscript(history, { currentMessageId: '1.4', allowedUsers: [], maxMessages: 1 })).toBe('[User] staging');
  });

  it('returns null when there is nothing before the message', () => {
    expect(buildThreadTranscript(history.slice(4), { currentMessageId: '1.4', allowedUsers: [] })).toBeNull();
  });

  it('frames the transcript ahead of the prompt', () => {
    const prompt = withThreadHistory('[User] hi', 'go');
    expect(prompt.split('\n').slice(3)).toEqual([
      '--- BEGIN THREAD HISTORY ---',
      '[User] hi',
      '--- END THREAD HISTORY ---',
      '',
      'Now respond to the latest message:',
      'go',
    ]);
  });
});
