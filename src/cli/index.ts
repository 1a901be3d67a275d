#!/usr/bin/env node

/**
 * IDA Data Mart CLI
 *
 * Loads telecom service-quality (IDA) extracts into the PostgreSQL data mart
 * and inspects the resulting facts and variance pivot.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerEtlCommand } from "./commands/etl.js";
import { registerFactsCommand } from "./commands/facts.js";
import { registerVarianceCommand } from "./commands/variance.js";

const program = new Command();

program
  .name("ida-mart")
  .description("IDA service-quality data mart: ETL and analytics CLI")
  .version("0.1.0");

registerDbCommand(program);
registerEtlCommand(program);
registerVarianceCommand(program);
registerFactsCommand(program);

program.action(() => {
  program.outputHelp();
});

program.parse();
