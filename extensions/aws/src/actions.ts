import { DeleteVolumeCommand, StopInstancesCommand } from "@aws-sdk/client-ec2";
import { StopDBInstanceCommand } from "@aws-sdk/client-rds";

import {
  dispatchAction,
  withTimeout,
  type ActionOutcome,
  type ActionRequest,
  type OptimizationActionHandler,
  type ResourceSample,
} from "../../../src/plugin-sdk/index.js";
import { destroyAwsClients, type AwsClientFactory } from "./clients.js";

export type AwsActionHandlerOptions = {
  createClients: AwsClientFactory;
  callTimeoutMs: number;
};

/** Stops EC2 and RDS instances; deletes unattached EBS volumes. */
export class AwsActionHandler implements OptimizationActionHandler {
  readonly provider = "AWS" as const;

  constructor(private readonly options: AwsActionHandlerOptions) {}

  async apply(request: ActionRequest): Promise<ActionOutcome> {
    return dispatchAction(request, {
      stop: (sample) => this.stop(sample),
      delete: (sample) => this.deleteVolume(sample),
    });
  }

  private async stop(sample: ResourceSample): Promise<string> {
    const clients = this.options.createClients();
    try {
      if (sample.kind === "DATABASE") {
        await withTimeout(
          () => clients.rds.send(new StopDBInstanceCommand({ DBInstanceIdentifier: sample.resourceId })),
          this.options.callTimeoutMs,
          "StopDBInstance",
        );
        return `Stopped RDS instance ${sample.resourceId}`;
      }
      await withTimeout(
        () => clients.ec2.send(new StopInstancesCommand({ InstanceIds: [sample.resourceId] })),
        this.options.callTimeoutMs,
        "StopInstances",
      );
      return `Stopped EC2 instance ${sample.resourceId}`;
    } finally {
      destroyAwsClients(clients);
    }
  }

  private async deleteVolume(sample: ResourceSample): Promise<string> {
    const clients = this.options.createClients();
    try {
      await withTimeout(
        () => clients.ec2.send(new DeleteVolumeCommand({ VolumeId: sample.resourceId })),
        this.options.callTimeoutMs,
        "DeleteVolume",
      );
      return `Deleted EBS volume ${sample.resourceId}`;
    } finally {
      destroyAwsClients(clients);
    }
  }
}
