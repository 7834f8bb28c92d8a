import { main } from './main.js'

main(process.argv.slice(2), process.env).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(`[cli] ${err instanceof Error ? err.message : String(err)}`)
    process.exitCode = 1
  },
)
