import { resolve } from 'path';
import { createCoreFromConfig, loadConfig } from '../src/config.js';
import { startManagementServer } from '../src/management.js';
import { createQuery, FRONTEND_TRANSPORTS, type BackendQuery } from '../src/index.js';

// process command line arguments
const args = process.argv.slice(2);
const configPath = resolve(args[0] || 'config/dns-proxy.example.json');
const names = args.slice(1).length
  ? args.slice(1)
  : ['rcode-nxdomain.metrics.test', 'www.cache.metrics.test', 'other.metrics.test'];

// stand-in backend: one A record for every name
const backend: BackendQuery = async query => ({
  id: query.id,
  rcode: 'NOERROR',
  flags: ['RD', 'RA'],
  question: query,
  answers: [{ name: query.name, type: 'A', class: 'IN', ttl: 3600, data: '192.0.2.1' }],
  authorities: [],
  additionals: [],
  provenance: 'backend',
});

async function main() {
  const config = loadConfig(configPath);
  const core = createCoreFromConfig(config, backend);

  // every name once on every transport
  let id = 1;
  for (const name of names) {
    for (const frontend of FRONTEND_TRANSPORTS) {
      const response = await core.handleQuery(frontend, createQuery({ id: id++, name }));
      console.log(`${frontend}\t${name}\t${response.rcode}\t${response.provenance}`);
    }
  }
  console.log(JSON.stringify(core.counters.toJSON(), null, 2));

  if (config.webserver) {
    const { address } = await startManagementServer(core.counters, config.webserver);
    console.log(`counters at http://${address.address}:${address.port}/api/v1/servers/localhost`);
  }
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
