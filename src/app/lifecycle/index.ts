export { type CreateReadinessChecksFn, createReadinessChecks } from "./readiness"
export { type CreateStartHooksFn, createStartHooks } from "./start"
export { type CreateStopHooksFn, createStopHooks } from "./stop"
