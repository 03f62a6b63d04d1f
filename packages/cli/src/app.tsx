import React, { useState, useEffect } from 'react';
import { Box, useApp, useInput, useStdout } from 'ink';
import type { DiagnosticSession, DiagnosticVerdict } from '@ecdh-probe/core';
import { TranscriptView } from './components/transcript-view.js';
import { InputBar } from './components/input-bar.js';
import { StatusBar } from './components/status-bar.js';
import { terminalViewport } from './render/terminal-surface.js';
import type { FrameRow, TerminalSurface } from './render/terminal-surface.js';

// Rows taken by the bordered input and status bars.
const CHROME_ROWS = 6;

interface AppProps {
  session: DiagnosticSession;
  surface: TerminalSurface;
}

export function App({ session, surface }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [size, setSize] = useState({ columns: stdout.columns || 80, rows: stdout.rows || 24 });
  const [frame, setFrame] = useState<FrameRow[]>(surface.getFrame());
  const [runs, setRuns] = useState(session.getRunCount());
  const [lastVerdict, setLastVerdict] = useState<DiagnosticVerdict | null>(null);
  const [logSize, setLogSize] = useState(session.log.size);

  const transcriptRows = Math.max(1, size.rows - CHROME_ROWS);

  useEffect(() => {
    const onResize = () => setSize({ columns: stdout.columns || 80, rows: stdout.rows || 24 });
    stdout.on('resize', onResize);
    return () => { stdout.off('resize', onResize); };
  }, [stdout]);

  useEffect(() => {
    const onFrame = (rows: FrameRow[]) => setFrame(rows);
    surface.on('frame', onFrame);
    return () => { surface.off('frame', onFrame); };
  }, [surface]);

  useEffect(() => {
    const onVerdict = (verdict: DiagnosticVerdict) => {
      setLastVerdict(verdict);
      setRuns(session.getRunCount());
    };
    const onRedrawn = () => setLogSize(session.log.size);
    session.on('verdict', onVerdict);
    session.on('redrawn', onRedrawn);
    session.on('quit', exit);
    return () => {
      session.off('verdict', onVerdict);
      session.off('redrawn', onRedrawn);
      session.off('quit', exit);
    };
  }, [session, exit]);

  useEffect(() => {
    session.handleEvent({
      type: 'redraw',
      viewport: terminalViewport(size.columns, transcriptRows),
    });
  }, [session, size.columns, transcriptRows]);

  useInput((input, key) => {
    if (key.escape || (key.ctrl && input === 'c')) {
      session.handleEvent({ type: 'quit' });
    }
  });

  const handleInput = (text: string) => {
    session.handleEvent({ type: 'line', text });
  };

  return (
    <Box flexDirection="column" height={size.rows}>
      <TranscriptView rows={frame} />
      <InputBar onSubmit={handleInput} />
      <StatusBar
        runs={runs}
        lastVerdict={lastVerdict}
        logSize={logSize}
        logCapacity={session.log.capacity}
      />
    </Box>
  );
}
