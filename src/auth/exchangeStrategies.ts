import type { FlowConfig } from '../config/flowConfig.js';
import { DirectTokenExchange } from './directExchange.js';
import { LibraryDependencies, LibraryTokenExchange } from './libraryExchange.js';
import { ProxiedTokenExchange } from './proxiedExchange.js';
import type { TokenExchangeStrategy } from './tokenExchange.js';

/**
 * Select the exchange strategy named by the configuration
 */
export function createTokenExchangeStrategy(
  config: Readonly<FlowConfig>,
  dependencies: LibraryDependencies = {}
): TokenExchangeStrategy {
  switch (config.strategy) {
    case 'direct':
      return new DirectTokenExchange(config, dependencies);
    case 'proxied':
      return new ProxiedTokenExchange(config, dependencies);
    case 'library':
      return new LibraryTokenExchange(config, dependencies);
  }
}
