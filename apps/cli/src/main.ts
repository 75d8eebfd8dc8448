import dotenv from 'dotenv'
import { runCli } from './run'

dotenv.config()

async function main() {
  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())
  const code = await runCli(process.argv.slice(2), { signal: controller.signal })
  process.exit(code)
}

main().catch((e) => {
  console.error(e)
  process.exit(1)
})
