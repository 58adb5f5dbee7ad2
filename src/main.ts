import { run } from "./server"

run().catch((err: unknown) => {
  console.error(err)
  process.exitCode = 1
})
