import type { HandlerRegistry } from "../types/handlers.js";
import { callHandler } from "./call/index.js";
import { emitHandler } from "./events/emit.js";
import { listenHandler } from "./events/listen.js";
import { raiseHandler } from "./raise.js";
import { runHandler } from "./run/shell.js";
import { setHandler } from "./set.js";
import { waitHandler } from "./wait.js";

export function builtinHandlers(): HandlerRegistry {
  return {
    call: callHandler,
    set: setHandler,
    emit: emitHandler,
    listen: listenHandler,
    raise: raiseHandler,
    wait: waitHandler,
    run: runHandler
  };
}
