import type { PriceTable } from "../../../src/plugin-sdk/index.js";

// On-demand rates, us-central1, USD/hour.
export const MACHINE_HOURLY: PriceTable = {
  defaultRate: 0.1,
  rates: {
    "e2-micro": 0.0084,
    "e2-small": 0.0168,
    "e2-medium": 0.0335,
    "e2-standard-2": 0.067,
    "e2-standard-4": 0.134,
    "n1-standard-1": 0.0475,
    "n1-standard-2": 0.095,
    "n1-standard-4": 0.19,
    "n2-standard-2": 0.0971,
    "n2-standard-4": 0.1942,
    "c2-standard-4": 0.2088,
  },
};

// Persistent disk USD per GB-month.
export const DISK_GB_MONTH: PriceTable = {
  defaultRate: 0.04,
  rates: {
    "pd-standard": 0.04,
    "pd-balanced": 0.1,
    "pd-ssd": 0.17,
    "pd-extreme": 0.125,
    "hyperdisk-balanced": 0.06,
  },
};
