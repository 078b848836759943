import { ParseError, readResolvConf, type Ip, type Network } from 'resolvconf';

function formatIp(ip: Ip) {
  return ip.type === 'ipv6' && ip.scope ? `${ip.ip}%${ip.scope}` : ip.ip;
}

function formatNetwork(network: Network) {
  return `${network.ip}/${network.netmask}`;
}

const path = process.argv[2];

readResolvConf({ path })
  .then((config) => {
    console.log('nameservers:', config.getNameserversOrLocal().map(formatIp));
    console.log('search:', config.getLastSearchOrDomain());
    console.log('sortlist:', config.sortlist.map(formatNetwork));
    console.log('ndots:', config.ndots);
    console.log('timeout:', config.timeout);
    console.log('attempts:', config.attempts);
    console.log('rotate:', config.rotate);
    console.log('edns0:', config.edns0);
    console.log(
      'lookup:',
      config.lookup.map((lookup) =>
        lookup.type === 'extra' ? lookup.name : lookup.type
      )
    );
    console.log('family:', config.family);
  })
  .catch((err: unknown) => {
    if (err instanceof ParseError) {
      console.error(`invalid resolver configuration (${err.kind}):`, err.message);
    } else {
      console.error('failed to read resolver configuration:', err);
    }
    process.exitCode = 1;
  });
