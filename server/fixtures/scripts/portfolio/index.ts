import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { loadConfig } from "../../../src/config";
import { createLogger } from "../../../src/logger";
import { DEFAULT_NETWORK } from "../../../src/networks";
import { loadPortfolio } from "../../../src/portfolio";
import {
  describePortfolioError,
  renderPortfolio,
} from "../../../src/presentation/format";
import { createPositionFetcher } from "../../../src/resolvers/aave/fetcher";

import { createAavePortfolioHandler, type AaveAccountFixtures } from "../aave/mock";
import { loadEnvFile } from "../core/env";
import { readJson } from "../core/io";
import { createMockFetch } from "../core/mock-fetch";

const getFlagValue = (argv: string[], flag: string): string | null => {
  const idx = argv.indexOf(flag);
  const value = idx >= 0 ? argv[idx + 1] : null;
  return value && !value.startsWith("--") ? value : null;
};

export const run = async (argv: string[]): Promise<number> => {
  const here = dirname(fileURLToPath(import.meta.url));
  const serverDir = resolve(here, "..", "..", "..");
  const repoRoot = resolve(serverDir, "..");

  const inferredEnvFile =
    process.env.NODE_ENV === "production" ? "./env.production.sh" : "./env.local.sh";

  loadEnvFile(resolve(repoRoot, getFlagValue(argv, "--env-file") ?? inferredEnvFile));

  const config = loadConfig();
  const logger = createLogger("portfolio", config.logLevel);

  const network = getFlagValue(argv, "--network") ?? DEFAULT_NETWORK;
  const address =
    getFlagValue(argv, "--address") ?? "0x1111111111111111111111111111111111111111";
  const live = argv.includes("--live");

  const accounts = live
    ? {}
    : await readJson<AaveAccountFixtures>(
        resolve(serverDir, "fixtures", "providers", "aave", "accounts.json"),
      );

  const fetcher = createPositionFetcher({
    config,
    logger: createLogger("aave", config.logLevel),
    ...(live
      ? {}
      : {
          fetch: createMockFetch({
            handlers: [createAavePortfolioHandler({ apiUrl: config.apiUrl, accounts })],
            enabledProviders: ["aave"],
          }),
        }),
  });

  logger.info(`loading ${address} on ${network}${live ? " (live)" : " (fixtures)"}`);

  const result = await loadPortfolio(fetcher, { network, address });

  if (!result.ok) {
    console.log(describePortfolioError(result.error));

    return result.error.kind === "EmptyResult" ? 0 : 1;
  }

  for (const line of renderPortfolio(result.value)) console.log(line);

  return 0;
};

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);

    console.error(message);
    process.exitCode = 1;
  });
