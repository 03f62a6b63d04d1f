import React from 'react';
import { Box, Text } from 'ink';
import type { DiagnosticVerdict } from '@ecdh-probe/core';

interface StatusBarProps {
  runs: number;
  lastVerdict: DiagnosticVerdict | null;
  logSize: number;
  logCapacity: number;
}

const VERDICT_LABELS: Record<DiagnosticVerdict, { label: string; color: string }> = {
  'matches-remote-public': { label: 'BUG: peer_pub', color: 'red' },
  'matches-local-public': { label: 'BUG: our_pub', color: 'red' },
  distinct: { label: 'OK', color: 'green' },
};

export function verdictLabel(verdict: DiagnosticVerdict | null): { label: string; color: string } {
  return verdict ? VERDICT_LABELS[verdict] : { label: 'not run', color: 'gray' };
}

export function StatusBar({ runs, lastVerdict, logSize, logCapacity }: StatusBarProps) {
  const verdict = verdictLabel(lastVerdict);

  return (
    <Box borderStyle="single" borderColor="gray" paddingX={1}>
      <Text color="cyan">[runs: {runs}]</Text>
      <Text> </Text>
      <Text color={verdict.color}>[{verdict.label}]</Text>
      <Text> </Text>
      <Text color="yellow">[log {logSize}/{logCapacity}]</Text>
    </Box>
  );
}
