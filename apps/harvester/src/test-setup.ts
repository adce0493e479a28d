import { setLogSink } from '@unitcost/logger'

// Tests inject their own transport; anything reaching the global fetch is a bug.
globalThis.fetch = async () => {
  throw new Error('Outbound network is disabled in harvester tests')
}

setLogSink(() => {})
