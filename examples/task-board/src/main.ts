import { createNodeApp } from "@termloom/node";
import { registerBoardActions, createInitialState } from "./helpers/state.js";
import { BoardScreen } from "./screens/boardScreen.js";

const { app } = createNodeApp({ initialState: createInitialState() });
registerBoardActions(app.store);

try {
  await app.run(new BoardScreen());
} catch (e: unknown) {
  const message = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
  process.stderr.write(`task-board: ${message}\n`);
  process.exitCode = 1;
}
