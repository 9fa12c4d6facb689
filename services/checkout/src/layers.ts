import { Layer } from "effect"
import { NodeHttpClient } from "@effect/platform-node"
import { DatabaseLive } from "./db.js"
import { CheckoutConfigLive, GatewayConfigLive, WorkerConfigLive } from "./config.js"
import { CatalogRepositoryLive } from "./repositories/CatalogRepositoryLive.js"
import { StockRepositoryLive } from "./repositories/StockRepositoryLive.js"
import { OrderRepositoryLive } from "./repositories/OrderRepositoryLive.js"
import { TransactionLogRepositoryLive } from "./repositories/TransactionLogRepositoryLive.js"
import { CallbackInboxRepositoryLive } from "./repositories/CallbackInboxRepositoryLive.js"
import { UnitOfWorkLive } from "./repositories/UnitOfWorkLive.js"
import { StockLedgerLive } from "./services/StockLedgerLive.js"
import { OrderStoreLive } from "./services/OrderStoreLive.js"
import { FlatDeliveryFeeLive } from "./services/DeliveryFeeEstimator.js"
import { CheckoutServiceLive } from "./services/CheckoutServiceLive.js"
import { PaymentGatewayLive } from "./services/PaymentGatewayLive.js"
import { PaymentServiceLive } from "./services/PaymentServiceLive.js"
import { CallbackReconcilerLive } from "./services/CallbackReconcilerLive.js"

// Repository layers (depend on Database)
const RepositoriesLive = Layer.mergeAll(
  CatalogRepositoryLive,
  StockRepositoryLive,
  OrderRepositoryLive,
  TransactionLogRepositoryLive,
  CallbackInboxRepositoryLive,
  UnitOfWorkLive
).pipe(Layer.provide(DatabaseLive))

// Stock and order state are only touched through these two
const LedgerServicesLive = Layer.mergeAll(
  StockLedgerLive,
  OrderStoreLive
).pipe(Layer.provide(RepositoriesLive))

// Gateway client (depends on HttpClient)
const GatewayLive = PaymentGatewayLive.pipe(
  Layer.provide(NodeHttpClient.layer),
  Layer.provide(GatewayConfigLive)
)

const ReconcilerLive = CallbackReconcilerLive.pipe(
  Layer.provide(LedgerServicesLive),
  Layer.provide(RepositoriesLive),
  Layer.provide(CheckoutConfigLive),
  Layer.provide(GatewayConfigLive)
)

const ServicesLive = Layer.mergeAll(
  CheckoutServiceLive,
  PaymentServiceLive
).pipe(
  Layer.provide(LedgerServicesLive),
  Layer.provide(RepositoriesLive),
  Layer.provide(GatewayLive),
  Layer.provide(FlatDeliveryFeeLive),
  Layer.provide(CheckoutConfigLive)
)

// HTTP API process
export const AppLive = Layer.mergeAll(
  DatabaseLive,
  CheckoutConfigLive,
  ServicesLive,
  ReconcilerLive
)

// Callback worker process
export const WorkerLive = Layer.mergeAll(
  DatabaseLive,
  WorkerConfigLive,
  RepositoriesLive,
  ReconcilerLive
)
