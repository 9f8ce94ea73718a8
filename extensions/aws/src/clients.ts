import { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { EC2Client } from "@aws-sdk/client-ec2";
import { RDSClient } from "@aws-sdk/client-rds";
import { S3Client } from "@aws-sdk/client-s3";
import { fromIni } from "@aws-sdk/credential-providers";

import type { AwsProviderConfig } from "../../../src/plugin-sdk/index.js";

export type AwsClients = {
  ec2: EC2Client;
  cloudwatch: CloudWatchClient;
  rds: RDSClient;
  s3: S3Client;
};

export type AwsClientFactory = () => AwsClients;

/**
 * Build SDK v3 clients for the configured region. With a profile, credentials
 * come from the shared ini files; otherwise the SDK's default chain applies
 * (environment, SSO, instance metadata).
 */
export function createAwsClientFactory(config: AwsProviderConfig): AwsClientFactory {
  return () => {
    const clientConfig = {
      region: config.region,
      credentials: config.profile ? fromIni({ profile: config.profile }) : undefined,
    };
    return {
      ec2: new EC2Client(clientConfig),
      cloudwatch: new CloudWatchClient(clientConfig),
      rds: new RDSClient(clientConfig),
      s3: new S3Client(clientConfig),
    };
  };
}

export function destroyAwsClients(clients: AwsClients): void {
  clients.ec2.destroy();
  clients.cloudwatch.destroy();
  clients.rds.destroy();
  clients.s3.destroy();
}
