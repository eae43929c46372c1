#!/usr/bin/env -S node --import tsx
import {message} from '@optique/core/message';
import {run} from '@optique/run';
import {BusError, Errors} from '@typebus/core';
import {dispatch, parser} from './index.js';

const result = run(parser, {
  programName: 'typebus',
  version: '0.1.0',
  description: message`Typed in-process message bus tools`,
  help: 'both',
});

try {
  console.log(dispatch(result, process.stdout.isTTY === true));
} catch (err) {
  console.error(BusError.wrap(err).prettyPrint({ color: process.stderr.isTTY === true }));
  process.exit(BusError.has(err, Errors.BadInput) ? 2 : 1);
}
