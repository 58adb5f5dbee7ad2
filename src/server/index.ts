export { type BuiltServer, buildServer, errorMappings } from "./build-server"
export { run } from "./run"
