/**
 * Process entry point: loads configuration, wires the trading core and handles shutdown signals
 */

import { config as loadEnv } from 'dotenv';
import { ConfigurationManager } from './config/ConfigurationManager';
import { BitgetConnector } from './connectors/exchanges/BitgetConnector';
import { AdvisorClient } from './services/AdvisorClient';
import { AuditService } from './services/AuditService';
import { ExecutionCoordinator } from './services/ExecutionCoordinator';
import { OrderLedger } from './services/OrderLedger';
import { RiskGate } from './services/RiskGate';
import { TradingSession } from './services/TradingSession';
import { AdvisorStrategy } from './strategies/AdvisorStrategy';
import { HoldStrategy } from './strategies/HoldStrategy';
import { Strategy } from './strategies/Strategy';
import { FileLedgerStore } from './utils/LedgerStore';

loadEnv();

async function main(): Promise<void> {
  const configurationManager = new ConfigurationManager(process.env);
  const config = configurationManager.loadConfiguration();
  const auditService = new AuditService({
    signingKey: config.auditSigningKey ? Buffer.from(config.auditSigningKey) : undefined
  });

  const session = new TradingSession({
    credentials: config.exchange.credentials,
    productType: config.exchange.productType,
    marginCoin: config.exchange.marginCoin,
    allowedInstruments: config.instruments,
    maxClockSkewMs: config.exchange.maxClockSkewMs
  });

  const transport = new BitgetConnector(session, {
    restBaseUrl: config.exchange.restBaseUrl,
    publicWsUrl: config.exchange.publicWsUrl,
    privateWsUrl: config.exchange.privateWsUrl,
    requestTimeoutMs: config.exchange.requestTimeoutMs,
    ...config.stream,
    rateLimits: config.rateLimits,
    auditService
  });

  let strategy: Strategy = new HoldStrategy();
  let advisor: AdvisorClient | undefined;
  if (config.strategy.name === 'advisor') {
    strategy = new AdvisorStrategy(config.strategy);
    advisor = new AdvisorClient({ ...config.advisor, auditService });
    if (!(await advisor.checkHealth())) {
      auditService.notifyOperator('warn', `Advisor at ${config.advisor.baseUrl} is not reachable; signals will hold`);
    }
  }

  const coordinator = new ExecutionCoordinator(
    {
      session,
      transport,
      ledger: new OrderLedger(session),
      riskGate: new RiskGate(config.risk, session),
      strategy,
      auditService,
      signalSource: advisor,
      store: config.ledgerPath ? new FileLedgerStore(config.ledgerPath, auditService) : undefined
    },
    config.loop
  );

  auditService.logEvent('CONFIGURATION_LOADED', configurationManager.toSafeObject(config));

  const stop = (signal: string) => {
    coordinator
      .shutdown(signal)
      .then(() => process.exit(0))
      .catch(error => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  await coordinator.start();
}

main().catch(error => {
  console.error('Fatal:', error instanceof Error ? error.message : error);
  process.exit(1);
});
