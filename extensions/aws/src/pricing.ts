import type { PriceTable } from "../../../src/plugin-sdk/index.js";

// On-demand Linux rates, us-east-1, USD/hour.
export const EC2_HOURLY: PriceTable = {
  defaultRate: 0.1,
  rates: {
    "t3.nano": 0.0052,
    "t3.micro": 0.0104,
    "t3.small": 0.0208,
    "t3.medium": 0.0416,
    "t3.large": 0.0832,
    "t3.xlarge": 0.1664,
    "m5.large": 0.096,
    "m5.xlarge": 0.192,
    "m5.2xlarge": 0.384,
    "c5.large": 0.085,
    "c5.xlarge": 0.17,
    "r5.large": 0.126,
    "r5.xlarge": 0.252,
  },
};

// Single-AZ MySQL/PostgreSQL rates, USD/hour.
export const RDS_HOURLY: PriceTable = {
  defaultRate: 0.2,
  rates: {
    "db.t3.micro": 0.017,
    "db.t3.small": 0.034,
    "db.t3.medium": 0.068,
    "db.t3.large": 0.136,
    "db.m5.large": 0.171,
    "db.m5.xlarge": 0.342,
    "db.r5.large": 0.24,
    "db.r5.xlarge": 0.48,
  },
};

// USD per GB-month.
export const EBS_GB_MONTH: PriceTable = {
  defaultRate: 0.1,
  rates: {
    gp2: 0.1,
    gp3: 0.08,
    io1: 0.125,
    io2: 0.125,
    st1: 0.045,
    sc1: 0.015,
    standard: 0.05,
  },
};

export const S3_STANDARD_GB_MONTH = 0.023;
