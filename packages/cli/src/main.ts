import { runCli } from "./cli";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("continuo failed:", err);
    process.exitCode = 1;
  });
