import { AdsAPI, type AdsClient } from './ads.js';
import { loadConfig, resolveToken, type AdsConfig } from './config.js';
import { SandboxClient } from './sandbox.js';

export interface ClientOptions {
  sandbox: boolean;
  config?: AdsConfig;
}

export async function createAdsClient(options: ClientOptions): Promise<AdsClient> {
  if (options.sandbox) {
    return SandboxClient.load();
  }

  const config = options.config ?? loadConfig();
  const token = await resolveToken(config);
  if (!token) {
    throw new Error(
      'ADS API token not found: set ADS_API_TOKEN or write it to ~/.ads/dev_key ' +
        '(https://ui.adsabs.harvard.edu/user/settings/token)'
    );
  }

  return new AdsAPI({
    token,
    baseUrl: config.apiUrl,
    timeoutMs: config.timeoutMs,
  });
}
