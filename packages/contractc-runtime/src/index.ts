// @contractc/runtime - runtime dispatch for compiled contracts
// Lets calling code reach the right implementer without knowing its type.

export {
  type CallEnv,
  type DowncastFn,
  type DefaultFn,
  type DispatcherOptions,
  type Tagged,
  type DynHandle,
  type Dispatcher,
  ClosedDispatcher,
  OpenDispatcher,
  createDispatcher,
} from "./dispatcher.ts";

export {
  type MethodFn,
  type ImplementerSpec,
  type ImplementerBinding,
  implementer,
} from "./binding.ts";

export { type DispatchErrorKind, DispatchError } from "./errors.ts";
