import React from 'react';
import { Box, Text } from 'ink';
import type { FrameRow } from '../render/terminal-surface.js';

interface TranscriptViewProps {
  rows: FrameRow[];
}

export function lineColor(text: string): string | undefined {
  const trimmed = text.trimStart();
  if (trimmed.startsWith('BUG:') || trimmed.startsWith('ERROR:')) return 'red';
  if (trimmed.startsWith('OK:')) return 'green';
  if (trimmed.startsWith('>')) return 'cyan';
  if (trimmed.startsWith('===')) return 'yellow';
  return undefined;
}

export function TranscriptView({ rows }: TranscriptViewProps) {
  return (
    <Box flexDirection="column" height={rows.length} paddingX={1}>
      {rows.map((row, i) => (
        <Text
          key={i}
          wrap="truncate-end"
          color={lineColor(row.text)}
          dimColor={row.style === 'small' && lineColor(row.text) === undefined}
        >
          {row.text || ' '}
        </Text>
      ))}
    </Box>
  );
}
