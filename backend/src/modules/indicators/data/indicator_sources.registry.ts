/**
 * INDICATOR SOURCES REGISTRY
 *
 * Source of truth for the indicators the dashboard knows about.
 * Market set: prices and supply-chain gauges collected upstream.
 * Cost set: composite PPI-weighted cost indices.
 *
 * Metadata columns inside a data file override these defaults.
 */

export type IndicatorCategory = 'market' | 'cost';

export type PreferredDirection = 'up' | 'down' | 'neutral';

/**
 * Shape of generated placeholder history (monthly)
 */
export interface SampleProfile {
  baseValue: number;
  trendPct: number;       // mean monthly drift, percent
  volatilityPct: number;  // monthly noise std dev, percent
}

export interface IndicatorSpec {
  indicatorId: string;
  displayName: string;
  source: string;
  unit: string;
  preferredDirection: PreferredDirection;
  /** Direction read as favourable for business impact, when it differs from the display preference */
  impactDirection?: PreferredDirection;
  category: IndicatorCategory;
  description: string;
  sample: SampleProfile;
}

const DEFAULT_PROFILE: SampleProfile = { baseValue: 100, trendPct: 0.5, volatilityPct: 1.0 };
const EQUIPMENT_PROFILE: SampleProfile = { baseValue: 180, trendPct: 0.3, volatilityPct: 1.5 };
const STEEL_PROFILE: SampleProfile = { baseValue: 200, trendPct: 0.4, volatilityPct: 2.0 };

export const INDICATOR_REGISTRY: IndicatorSpec[] = [
  // =========================
  // MARKET SET
  // =========================

  {
    indicatorId: 'cruspi',
    displayName: 'CRU Steel Price Index',
    source: 'CRU Steel Price Index',
    unit: '',
    preferredDirection: 'neutral',
    category: 'market',
    description: 'CRU Steel Price Index tracks steel price movements globally',
    sample: DEFAULT_PROFILE,
  },
  {
    indicatorId: 'cruspi_long',
    displayName: 'CRU Long Products Index',
    source: 'CRU Long Products Index',
    unit: '',
    preferredDirection: 'neutral',
    category: 'market',
    description: 'CRU Steel Price Index for Long Products tracks price movements for steel long products',
    sample: DEFAULT_PROFILE,
  },
  {
    indicatorId: 'wti_oil',
    displayName: 'WTI Crude Oil Price',
    source: 'WTI Crude Oil Price',
    unit: '$',
    preferredDirection: 'down',
    category: 'market',
    description: 'West Texas Intermediate Crude Oil price, U.S. benchmark for oil prices',
    sample: DEFAULT_PROFILE,
  },
  {
    indicatorId: 'supply_chain',
    displayName: 'NY Fed Supply Chain Pressure Index',
    source: 'NY Fed Supply Chain Pressure Index',
    unit: '',
    preferredDirection: 'down',
    category: 'market',
    description: 'Tracks global supply chain conditions (negative values = lower pressure)',
    sample: DEFAULT_PROFILE,
  },
  {
    indicatorId: 'ppi_steel_scrap',
    displayName: 'BLS Steel Scrap Price Index',
    source: 'BLS Steel Scrap Price Index',
    unit: '',
    preferredDirection: 'down',
    category: 'market',
    description: 'Producer Price Index for Metals and Metal Products: Carbon Steel Scrap',
    sample: STEEL_PROFILE,
  },
  {
    indicatorId: 'pmi_input_us',
    displayName: 'ISM Manufacturing PMI Input Prices',
    source: 'ISM Manufacturing PMI Input Prices',
    unit: '',
    preferredDirection: 'down',
    category: 'market',
    description: 'PMI Input Prices index tracks price changes paid by manufacturers',
    sample: DEFAULT_PROFILE,
  },
  {
    indicatorId: 'ism_supplier_deliveries',
    displayName: 'ISM Supplier Deliveries Index',
    source: 'ISM Supplier Deliveries Index',
    unit: '',
    preferredDirection: 'down',
    category: 'market',
    description:
      'ISM Manufacturing Report on Business Supplier Deliveries Index. Above 50 means slower deliveries, below 50 faster.',
    sample: DEFAULT_PROFILE,
  },
  {
    indicatorId: 'baltic_dry_index',
    displayName: 'Baltic Dry Index',
    source: 'Baltic Dry Index (BDIY Index)',
    unit: '',
    preferredDirection: 'neutral',
    impactDirection: 'down',
    category: 'market',
    description: 'Shipping cost index for raw materials; a gauge of global trade volume.',
    sample: DEFAULT_PROFILE,
  },
  {
    indicatorId: 'dollar_index',
    displayName: 'US Dollar Index',
    source: 'US Dollar Index (DXY Curncy)',
    unit: '',
    preferredDirection: 'neutral',
    impactDirection: 'down',
    category: 'market',
    description: 'Value of the US dollar against a basket of foreign currencies.',
    sample: DEFAULT_PROFILE,
  },
  {
    indicatorId: 'empire_prices_paid',
    displayName: 'Empire State 6M Ahead Prices Paid',
    source: 'NY Fed Empire State Manufacturing 6M Ahead Prices Paid',
    unit: '',
    preferredDirection: 'down',
    category: 'market',
    description: 'Expected price changes over the next 6 months in the NY manufacturing sector.',
    sample: DEFAULT_PROFILE,
  },

  // =========================
  // COST SET (composite PPI)
  // =========================

  {
    indicatorId: 'komatsu_equipment',
    displayName: 'Komatsu Heavy Equipment Cost Index',
    source: 'Komatsu Heavy Equipment Cost Index',
    unit: '',
    preferredDirection: 'down',
    category: 'cost',
    description: 'Composite cost index for Komatsu Heavy Equipment based on weighted BLS PPI components',
    sample: EQUIPMENT_PROFILE,
  },
  {
    indicatorId: 'sms_equipment',
    displayName: 'SMS Equipment Cost Index',
    source: 'SMS Equipment Cost Index',
    unit: '',
    preferredDirection: 'down',
    category: 'cost',
    description: 'Composite cost index for SMS Equipment based on weighted BLS PPI components',
    sample: EQUIPMENT_PROFILE,
  },
  {
    indicatorId: 'caterpillar_equipment',
    displayName: 'Caterpillar Equipment Cost Index',
    source: 'Caterpillar Equipment Cost Index',
    unit: '',
    preferredDirection: 'down',
    category: 'cost',
    description: 'Composite cost index for Caterpillar Equipment based on weighted BLS PPI components',
    sample: EQUIPMENT_PROFILE,
  },
  {
    indicatorId: 'fabricated_steel',
    displayName: 'Fabricated Structural Steel Cost Index',
    source: 'Fabricated Structural Steel Cost Index',
    unit: '',
    preferredDirection: 'down',
    category: 'cost',
    description: 'Composite cost index for Fabricated Structural Steel based on weighted BLS PPI components',
    sample: STEEL_PROFILE,
  },
  {
    indicatorId: 'cement_ready_mix',
    displayName: 'Cement and Ready-Mix Cost Index',
    source: 'Cement and Ready-Mix Cost Index',
    unit: '',
    preferredDirection: 'down',
    category: 'cost',
    description: 'Composite cost index for Cement and Ready-Mix based on weighted BLS PPI components',
    sample: { baseValue: 220, trendPct: 0.25, volatilityPct: 1.2 },
  },
  {
    indicatorId: 'explosives',
    displayName: 'Explosives & Accessories Cost Index',
    source: 'Explosives & Accessories Cost Index',
    unit: '',
    preferredDirection: 'down',
    category: 'cost',
    description: 'Composite cost index for Explosives & Accessories based on weighted BLS PPI components',
    sample: { baseValue: 175, trendPct: 0.35, volatilityPct: 1.8 },
  },
];

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function getIndicatorSpec(indicatorId: string): IndicatorSpec | undefined {
  return INDICATOR_REGISTRY.find((s) => s.indicatorId === indicatorId);
}

export function getIndicatorIds(category?: IndicatorCategory): string[] {
  return INDICATOR_REGISTRY
    .filter((s) => !category || s.category === category)
    .map((s) => s.indicatorId);
}

function titleCase(indicatorId: string): string {
  return indicatorId
    .split('_')
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Registry entry, or generic defaults for ids the registry does not list
 */
export function resolveIndicatorSpec(indicatorId: string): IndicatorSpec {
  const spec = getIndicatorSpec(indicatorId);
  if (spec) return spec;

  const label = titleCase(indicatorId);
  return {
    indicatorId,
    displayName: label,
    source: label,
    unit: '',
    preferredDirection: 'neutral',
    category: 'market',
    description: `${label} indicator`,
    sample: DEFAULT_PROFILE,
  };
}
