import { runCli } from './cli'
import { loadEnv } from './env'

runCli(loadEnv(process.env), (line) => {
  process.stdout.write(line)
})
