#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import { ConsoleLogSink, DiagnosticSession, FileLogSink } from '@ecdh-probe/core';
import { App } from './app.js';
import { runOnce } from './headless.js';
import { parseOptions } from './options.js';
import { TerminalSurface } from './render/terminal-surface.js';

async function main() {
  const options = parseOptions(process.argv.slice(2));
  const level = options.verbose ? 'debug' : 'info';

  if (options.once) {
    const sink = options.logPath ? new FileLogSink(options.logPath, level) : new ConsoleLogSink(level);
    const session = new DiagnosticSession({ sink });
    process.exit(runOnce(session, line => console.log(line)));
  }

  const sink = new FileLogSink(options.logPath, level);
  const surface = new TerminalSurface();
  const session = new DiagnosticSession({ sink, surface });

  console.log(`Diagnostic log: ${sink.path}`);
  session.start();

  const { waitUntilExit } = render(
    React.createElement(App, { session, surface }),
    { exitOnCtrlC: false }
  );

  await waitUntilExit();
  process.exit(0);
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
