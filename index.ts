#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from './server.js';
import { runCli } from './src/cli.js';

async function serve() {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Markov Rank MCP Server running on stdio");
}

async function main() {
  const argv = process.argv.slice(2);

  if (argv[0] === "serve") {
    await serve();
    return;
  }

  process.exitCode = await runCli(argv, {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
  });
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
