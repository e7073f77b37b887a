import type { BusinessRecord, MarketingRecord, Platform } from "../../core/types.js";

export function marketing(
  date: string,
  platform: Platform,
  impressions: number,
  clicks: number,
  spend: number,
  attributed_revenue: number,
  extra: Partial<MarketingRecord> = {}
): MarketingRecord {
  return {
    date,
    platform,
    tactic: "",
    state: "",
    campaign: "",
    impressions,
    clicks,
    spend,
    attributed_revenue,
    ...extra,
  };
}

export function business(
  date: string,
  orders: number,
  total_revenue: number,
  overrides: Partial<BusinessRecord> = {}
): BusinessRecord {
  return {
    date,
    orders,
    new_orders: 0,
    new_customers: 0,
    total_revenue,
    gross_profit: 0,
    cogs: 0,
    ...overrides,
  };
}

/**
 * Three business days; 2024-03-05 has no marketing and 2024-03-06 has
 * marketing without a business row.
 */
export function sampleMarketing(): MarketingRecord[] {
  return [
    marketing("2024-03-01", "Facebook", 1000, 20, 100, 50),
    marketing("2024-03-01", "Google", 500, 20, 100, 150),
    marketing("2024-03-02", "Facebook", 100, 10, 20, 10, { campaign: "A" }),
    marketing("2024-03-02", "Facebook", 200, 30, 30, 15, { campaign: "B" }),
    marketing("2024-03-06", "TikTok", 100, 1, 10, 5),
  ];
}

export function sampleBusiness(): BusinessRecord[] {
  return [
    business("2024-03-01", 10, 1000, { gross_profit: 400, new_customers: 4 }),
    business("2024-03-02", 5, 500, { gross_profit: 200, new_customers: 1 }),
    business("2024-03-05", 2, 200, { gross_profit: 80 }),
  ];
}
