import { Command } from "commander";

import { registerAuditCommand } from "./audit.js";
import { registerChecksCommand } from "./checks.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("workload-auditor")
    .description("Audit Kubernetes manifests for reliability and security best practices")
    .version("0.1.0")
    .option("--config <path>", "Audit config path (defaults to the bundled config/default.yaml)")
    .option("--debug", "Show error details and stack traces", false);

  registerAuditCommand(program);
  registerChecksCommand(program);

  return program;
}
