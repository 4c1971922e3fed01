import { main } from "./app/main.js";
import { devError, errorMessage } from "./shared/index.js";

main().catch((err: unknown) => {
  devError("cadence failed to start:", errorMessage(err));
  process.exit(1);
});
