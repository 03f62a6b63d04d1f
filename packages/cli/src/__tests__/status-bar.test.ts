import { describe, it, expect } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { StatusBar, verdictLabel } from '../components/status-bar.js';

const stripAnsi = (text: string) => text.replace(/\u001b\[[0-9;]*m/g, '');

function statusLine(props: React.ComponentProps<typeof StatusBar>): string {
  const { lastFrame, unmount } = render(React.createElement(StatusBar, props));
  const frame = stripAnsi(lastFrame() ?? '');
  unmount();
  const line = frame.split('\n').find(l => l.includes('[runs:'));
  return (line ?? '').replace(/[│|]/g, '').trim();
}

describe('StatusBar', () => {
  it('should show the idle state before any run', () => {
    expect(statusLine({ runs: 0, lastVerdict: null, logSize: 2, logCapacity: 20 }))
      .toBe('[runs: 0] [not run] [log 2/20]');
  });

  it('should show a clean verdict and the log fill', () => {
    expect(statusLine({ runs: 1, lastVerdict: 'distinct', logSize: 14, logCapacity: 20 }))
      .toBe('[runs: 1] [OK] [log 14/20]');
  });

  it('should name which public key the secret matched', () => {
    expect(statusLine({ runs: 3, lastVerdict: 'matches-remote-public', logSize: 20, logCapacity: 20 }))
      .toBe('[runs: 3] [BUG: peer_pub] [log 20/20]');
    expect(statusLine({ runs: 4, lastVerdict: 'matches-local-public', logSize: 20, logCapacity: 20 }))
      .toBe('[runs: 4] [BUG: our_pub] [log 20/20]');
  });
});

describe('verdictLabel', () => {
  it('should colour bugs red and clean runs green', () => {
    expect(verdictLabel('matches-local-public')).toEqual({ label: 'BUG: our_pub', color: 'red' });
    expect(verdictLabel('distinct')).toEqual({ label: 'OK', color: 'green' });
    expect(verdictLabel(null)).toEqual({ label: 'not run', color: 'gray' });
  });
});
