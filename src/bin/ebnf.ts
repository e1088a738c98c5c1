#!/usr/bin/env node
/* tslint:disable:no-console */
import {Cli} from '../cli';

Cli.run(process.argv.slice(2))
  .then(status => (process.exitCode = status))
  .catch(error => {
    console.error(error instanceof Error ? error.stack : error);
    process.exitCode = 1;
  });
