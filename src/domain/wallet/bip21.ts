/**
 * BIP21 payment URIs
 *
 * `bitcoin:<address>[?amount=<btc>][&label=<text>][&message=<text>]`.
 * A string without the scheme is treated as a bare address.
 *
 * @module domain/wallet/bip21
 */

import { appErr, ok, type Result } from '../result'
import { formatAmount, parseAmount } from '../transaction/recipients'

const SCHEME = 'bitcoin:'

export interface PaymentRequest {
  address: string
  amountSats?: number
  label?: string
  message?: string
}

function nonBlank(value: string | null): string | undefined {
  if (value === null) return undefined
  const trimmed = value.trim()
  return trimmed === '' ? undefined : trimmed
}

/**
 * Parse a scanned or pasted payment request.
 *
 * Fails with INVALID_PAYMENT_URI for an unknown `req-` parameter and with
 * INVALID_AMOUNT for a malformed amount. The address is not validated here.
 *
 * @example
 * ```typescript
 * parsePaymentUri('bitcoin:bc1q...?amount=0.0015&label=Rent')
 * // ok({ address: 'bc1q...', amountSats: 150000, label: 'Rent' })
 * ```
 */
export function parsePaymentUri(input: string): Result<PaymentRequest> {
  const trimmed = input.trim()

  if (!trimmed.toLowerCase().startsWith(SCHEME)) {
    return ok({ address: trimmed })
  }

  const rest = trimmed.slice(SCHEME.length)
  const queryStart = rest.indexOf('?')
  const address = (queryStart === -1 ? rest : rest.slice(0, queryStart)).trim()
  const params = new URLSearchParams(queryStart === -1 ? '' : rest.slice(queryStart + 1))

  if (address === '') {
    return appErr('INVALID_PAYMENT_URI', 'Payment URI has no address')
  }

  const normalized = new Map<string, string>()
  for (const [key, value] of params) {
    const lowerKey = key.toLowerCase()
    if (lowerKey.startsWith('req-')) {
      return appErr('INVALID_PAYMENT_URI', `Unsupported required parameter: ${key}`, { parameter: key })
    }
    if (!normalized.has(lowerKey)) {
      normalized.set(lowerKey, value)
    }
  }

  const request: PaymentRequest = { address }

  const amount = nonBlank(normalized.get('amount') ?? null)
  if (amount !== undefined) {
    const parsed = parseAmount(amount, 'btc')
    if (!parsed.ok) {
      return parsed
    }
    request.amountSats = parsed.value
  }

  const label = nonBlank(normalized.get('label') ?? null)
  if (label !== undefined) request.label = label

  const message = nonBlank(normalized.get('message') ?? null)
  if (message !== undefined) request.message = message

  return ok(request)
}

/**
 * Build a payment URI for sharing a receive address.
 */
export function buildPaymentUri(request: PaymentRequest): string {
  const params: string[] = []
  if (request.amountSats !== undefined && request.amountSats > 0) {
    params.push(`amount=${formatAmount(request.amountSats, 'btc')}`)
  }
  if (request.label) {
    params.push(`label=${encodeURIComponent(request.label)}`)
  }
  if (request.message) {
    params.push(`message=${encodeURIComponent(request.message)}`)
  }
  return params.length > 0
    ? `${SCHEME}${request.address}?${params.join('&')}`
    : `${SCHEME}${request.address}`
}
