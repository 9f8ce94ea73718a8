import type { PriceTable } from "../../../src/plugin-sdk/index.js";

// Pay-as-you-go Linux rates, East US, USD/hour.
export const VM_HOURLY: PriceTable = {
  defaultRate: 0.1,
  rates: {
    Standard_B1s: 0.0104,
    Standard_B1ms: 0.0207,
    Standard_B2s: 0.0416,
    Standard_B2ms: 0.0832,
    Standard_D2s_v3: 0.096,
    Standard_D4s_v3: 0.192,
    Standard_D2s_v5: 0.096,
    Standard_D4s_v5: 0.192,
    Standard_E2s_v3: 0.126,
    Standard_E4s_v3: 0.252,
    Standard_F2s_v2: 0.0846,
    Standard_F4s_v2: 0.169,
  },
};

// Managed disk USD per GB-month, keyed by SKU.
export const DISK_GB_MONTH: PriceTable = {
  defaultRate: 0.075,
  rates: {
    Standard_LRS: 0.045,
    StandardSSD_LRS: 0.075,
    StandardSSD_ZRS: 0.094,
    Premium_LRS: 0.135,
    Premium_ZRS: 0.169,
    PremiumV2_LRS: 0.12,
    UltraSSD_LRS: 0.12,
  },
};
