/**
 * Optimize the visiting order of a list of addresses from the command line
 * Run: npm run build && npm run optimize -- "Depot, Kochi" "Aluva" "Edappally"
 *
 * The first address is the depot. Needs GOOGLE_MAPS_API_KEY.
 */

import { createDependencies } from '../src/server';
import { createOptimizeRouteSchema, toRouteToolPayload } from '../src/modules/route-optimizer';
import { validateSchema } from '../src/shared/utils/validation.utils';
import { RouteOptimizationStatus } from '../src/core';

/**
 * Addresses from the command line, trimmed and checked against the stop cap
 */
export function parseAddresses(args: string[], maxStops: number): string[] {
  return validateSchema(createOptimizeRouteSchema(maxStops), { addresses: args }).addresses;
}

async function main() {
  if (process.argv.length <= 2) {
    console.error('Usage: npm run optimize -- "<depot>" "<stop>" ["<stop>" ...]');
    process.exit(1);
  }

  const { routeOptimizer, maxStops } = createDependencies();
  const addresses = parseAddresses(process.argv.slice(2), maxStops);

  console.log(`🔄 Optimizing ${addresses.length} stops...\n`);
  const result = await routeOptimizer.optimizeRoute(addresses);

  console.log(JSON.stringify(toRouteToolPayload(result), null, 2));

  if (result.status !== RouteOptimizationStatus.SUCCESS) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main()
    .catch((error: unknown) => {
      console.error('❌ Optimization script failed:', error);
      process.exit(1);
    });
}
