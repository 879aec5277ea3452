#!/usr/bin/env node
(async () => {
  const { main } = await import('./cli.js');
  process.exitCode = await main(process.argv.slice(2));
})().catch((err) => {
  console.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
