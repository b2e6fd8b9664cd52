import type { Logger } from './infrastructure/logger.js';
import type { AppConfig } from './config.js';
import { CatalogIndex } from './domain/catalog/CatalogIndex.js';
import { ProductResolver } from './domain/services/ProductResolver.js';
import { BatchResolver } from './domain/services/BatchResolver.js';
import { WeightEstimator } from './domain/services/WeightEstimator.js';
import { DeliveryZoneCalculator } from './domain/services/DeliveryZoneCalculator.js';
import { SessionService } from './domain/services/SessionService.js';
import { CheckoutService } from './domain/services/CheckoutService.js';
import { StandardPricingStrategy } from './domain/strategies/IPricingStrategy.js';
import { StandardPaymentPolicy } from './domain/strategies/IPaymentPolicy.js';
import { ReferenceDataLoader, type ReferenceData } from './infrastructure/reference/ReferenceDataLoader.js';
import type { IPricingOracleClient } from './infrastructure/clients/IPricingOracleClient.js';
import type { IOrderIntakeClient } from './infrastructure/clients/IOrderIntakeClient.js';
import type { ISessionStore } from './infrastructure/clients/ISessionStore.js';
import { HttpPricingOracleClient } from './infrastructure/clients/HttpPricingOracleClient.js';
import { PricingOracleMock } from './infrastructure/clients/PricingOracleMock.js';
import { HttpOrderIntakeClient } from './infrastructure/clients/HttpOrderIntakeClient.js';
import { OrderIntakeClientMock } from './infrastructure/clients/OrderIntakeClientMock.js';
import { InMemorySessionStore } from './infrastructure/clients/InMemorySessionStore.js';

export interface ServiceOverrides {
  referenceData?: ReferenceData;
  oracle?: IPricingOracleClient;
  orderIntake?: IOrderIntakeClient;
  sessionStore?: ISessionStore;
  clock?: () => Date;
}

export interface Services {
  catalog: CatalogIndex;
  resolver: ProductResolver;
  batchResolver: BatchResolver;
  zones: DeliveryZoneCalculator;
  oracle: IPricingOracleClient;
  sessions: SessionService;
  checkout: CheckoutService;
  close(): void;
}

// dependency injection
export function createServices(config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): Services {
  const loader = new ReferenceDataLoader(config.dataDir);
  const data = overrides.referenceData ?? loader.loadAll();

  const oracle = overrides.oracle ?? createOracle(config, loader, logger);
  const orderIntake = overrides.orderIntake ?? createOrderIntake(config, logger);

  const lifecycle = {
    continuationWindowMinutes: config.session.continuationWindowMinutes,
    idleTtlMinutes: config.session.idleTtlMinutes,
  };
  let ownedStore: InMemorySessionStore | null = null;
  let store: ISessionStore;
  if (overrides.sessionStore) {
    store = overrides.sessionStore;
  } else {
    ownedStore = new InMemorySessionStore(lifecycle, logger.child({ component: 'session-store' }));
    store = ownedStore;
  }

  const catalog = new CatalogIndex(data.catalog);
  const resolver = new ProductResolver(
    catalog,
    data.resolverRules,
    { maxCandidates: config.resolver.maxCandidates },
    logger.child({ component: 'resolver' })
  );
  const batchResolver = new BatchResolver(
    resolver,
    oracle,
    { itemTimeoutMs: config.resolver.batchItemTimeoutMs },
    logger.child({ component: 'batch-resolver' })
  );
  const zones = new DeliveryZoneCalculator(data.deliveryZones);
  const paymentPolicy = new StandardPaymentPolicy();

  const sessions = new SessionService(
    store,
    oracle,
    new StandardPricingStrategy(),
    paymentPolicy,
    new WeightEstimator(data.weights),
    catalog,
    logger.child({ component: 'sessions' }),
    {
      ...lifecycle,
      maxUnitsPerLine: config.cart.maxUnitsPerLine,
      maxKgPerLine: config.cart.maxKgPerLine,
    },
    overrides.clock
  );
  const checkout = new CheckoutService(
    sessions,
    zones,
    paymentPolicy,
    oracle,
    orderIntake,
    logger.child({ component: 'checkout' })
  );

  return {
    catalog,
    resolver,
    batchResolver,
    zones,
    oracle,
    sessions,
    checkout,
    close: () => ownedStore?.destroy(),
  };
}

function createOracle(config: AppConfig, loader: ReferenceDataLoader, logger: Logger): IPricingOracleClient {
  if (config.oracle.baseUrl) {
    return new HttpPricingOracleClient(
      {
        baseUrl: config.oracle.baseUrl,
        timeoutMs: config.oracle.timeoutMs,
        retryBackoffMs: config.oracle.retryBackoffMs,
      },
      logger.child({ component: 'pricing-oracle' })
    );
  }
  logger.warn('ORACLE_BASE_URL not set, serving quotes from data/price-quotes.json');
  return new PricingOracleMock(loader.loadSeedQuotes());
}

function createOrderIntake(config: AppConfig, logger: Logger): IOrderIntakeClient {
  if (config.orderIntake.baseUrl) {
    return new HttpOrderIntakeClient(
      { baseUrl: config.orderIntake.baseUrl, timeoutMs: config.orderIntake.timeoutMs },
      logger.child({ component: 'order-intake' })
    );
  }
  logger.warn('ORDER_INTAKE_BASE_URL not set, orders are kept in memory');
  return new OrderIntakeClientMock();
}
