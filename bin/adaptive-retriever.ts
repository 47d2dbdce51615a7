#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { runCommand } from '../src/cli/commands/runCommand';
import { evalCommand } from '../src/cli/commands/evalCommand';
import { stateCommand } from '../src/cli/commands/stateCommands';
import { projectRoot } from '../src/core/paths';

function readVersionFromPackageJson(): string {
  const pkgPath = path.join(projectRoot(__dirname), 'package.json');
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function main() {
  const program = new Command();
  program
    .name('adaptive-retriever')
    .description('adaptive-retriever: route queries between keyword, vector and hybrid retrieval')
    .version(readVersionFromPackageJson());

  program.addCommand(runCommand);
  program.addCommand(evalCommand);
  program.addCommand(stateCommand);
  program.parse(process.argv);
}

main();
