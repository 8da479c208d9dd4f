import { main } from "./cli";
import { friendlyErrorMessage } from "./ui/errorMessages";

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${friendlyErrorMessage(error)}\n`);
    process.exitCode = 1;
  }
);
