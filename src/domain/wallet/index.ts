/**
 * Wallet Domain - payment requests
 */

export { parsePaymentUri, buildPaymentUri } from './bip21'
export type { PaymentRequest } from './bip21'
