import { CommissionTier, PricingSettings } from '../config/pipeline-settings';

export interface ListingPrice {
  /** Price published on the marketplace, tax included. */
  finalPrice: number;
  /** Price before tax. */
  netPrice: number;
  profit: number;
}

const roundCurrency = (value: number) => Math.round((value + Number.EPSILON) * 100) / 100;

/**
 * Rate of the first tier whose bound covers the base cost. A cost above every bound takes the
 * highest configured rate; without tiers the single commission rate applies.
 */
export function commissionRateFor(baseCost: number, pricing: PricingSettings): number {
  const tiers: CommissionTier[] = pricing.commissionTiers;
  if (tiers.length === 0) return pricing.commissionRate;
  const tier = tiers.find((t) => t.max === null || baseCost <= t.max);
  return tier ? tier.rate : Math.max(...tiers.map((t) => t.rate));
}

/**
 * Selling price that keeps the target margin after operational cost, shipping,
 * marketplace commission and tax.
 */
export function calculateListingPrice(baseCost: number, pricing: PricingSettings): ListingPrice {
  const internalCost = baseCost + pricing.operationalCost;
  const desiredNet = internalCost * (1 + pricing.targetMargin);
  const netPrice = (desiredNet + pricing.shippingFee) / (1 - commissionRateFor(baseCost, pricing));
  const finalPrice = netPrice * (1 + pricing.taxRate);

  return {
    finalPrice: roundCurrency(finalPrice),
    netPrice: roundCurrency(netPrice),
    profit: roundCurrency(desiredNet - internalCost),
  };
}
