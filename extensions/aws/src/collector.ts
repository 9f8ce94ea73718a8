/**
 * AWS collector: EC2 instances, EBS volumes, RDS instances and S3 buckets,
 * normalized into resource samples.
 */

import {
  DescribeInstancesCommand,
  DescribeVolumesCommand,
  type Instance,
  type Tag,
  type Volume,
} from "@aws-sdk/client-ec2";
import { DescribeDBInstancesCommand, type DBInstance } from "@aws-sdk/client-rds";
import { GetBucketLifecycleConfigurationCommand, ListBucketsCommand } from "@aws-sdk/client-s3";

import {
  formatErrorMessage,
  lookupRate,
  storageHourlyCost,
  withTimeout,
  type CollectContext,
  type CollectionSettings,
  type PluginLogger,
  type ResourceCollector,
  type ResourceSample,
} from "../../../src/plugin-sdk/index.js";
import { destroyAwsClients, type AwsClientFactory, type AwsClients } from "./clients.js";
import { averageMetric, latestMetric, type MetricReader } from "./metrics.js";
import { EBS_GB_MONTH, EC2_HOURLY, RDS_HOURLY, S3_STANDARD_GB_MONTH } from "./pricing.js";

const HOUR_SECONDS = 3600;
const DAY_SECONDS = 86_400;
const BYTES_PER_GB = 1024 ** 3;
// S3 storage metrics are published once a day.
const S3_METRIC_WINDOW_HOURS = 48;

export type AwsCollectorOptions = {
  region: string;
  settings: CollectionSettings;
  createClients: AwsClientFactory;
  logger: PluginLogger;
};

type Window = { start: Date; end: Date; hours: number };

// "unknown" when the lookup failed for any reason but a missing configuration.
type LifecycleState = "true" | "false" | "unknown";

function isMissingLifecycle(error: unknown): boolean {
  return error instanceof Error && error.name === "NoSuchLifecycleConfiguration";
}

function tagValue(tags: Tag[] | undefined, key: string): string | undefined {
  return tags?.find((tag) => tag.Key === key)?.Value;
}

export class AwsResourceCollector implements ResourceCollector {
  readonly provider = "AWS" as const;

  constructor(private readonly options: AwsCollectorOptions) {}

  async collect(ctx: CollectContext): Promise<ResourceSample[]> {
    const { settings } = this.options;
    const window: Window = {
      start: new Date(ctx.now.getTime() - settings.lookbackHours * HOUR_SECONDS * 1000),
      end: ctx.now,
      hours: settings.lookbackHours,
    };

    const clients = this.options.createClients();
    try {
      const reader: MetricReader = {
        cloudwatch: clients.cloudwatch,
        timeoutMs: settings.callTimeoutMs,
        logger: this.options.logger,
        signal: ctx.signal,
      };
      const instances = await this.collectInstances(clients, reader, window);
      const volumes = await this.collectVolumes(clients, window, ctx.signal);
      const databases = await this.collectDatabases(clients, reader, window);
      const buckets = await this.collectBuckets(clients, reader, ctx.now, window);
      return [...instances, ...volumes, ...databases, ...buckets];
    } finally {
      destroyAwsClients(clients);
    }
  }

  // ── EC2 ───────────────────────────────────────────────────────────────────

  private async listInstances(clients: AwsClients, signal?: AbortSignal): Promise<Instance[]> {
    const instances: Instance[] = [];
    let nextToken: string | undefined;
    do {
      signal?.throwIfAborted();
      const response = await clients.ec2.send(new DescribeInstancesCommand({ NextToken: nextToken }));
      for (const reservation of response.Reservations ?? []) {
        instances.push(...(reservation.Instances ?? []));
      }
      nextToken = response.NextToken;
    } while (nextToken);
    return instances;
  }

  private async collectInstances(
    clients: AwsClients,
    reader: MetricReader,
    window: Window,
  ): Promise<ResourceSample[]> {
    const samples: ResourceSample[] = [];
    for (const instance of await this.listInstances(clients, reader.signal)) {
      reader.signal?.throwIfAborted();
      if (!instance.InstanceId) continue;
      const state = instance.State?.Name ?? "unknown";
      const running = state === "running";
      const dimensions = [{ Name: "InstanceId", Value: instance.InstanceId }];
      const query = { dimensions, start: window.start, end: window.end, periodSeconds: HOUR_SECONDS };

      // Stopped instances have no recent datapoints worth fetching.
      const avgCpuPercent = running
        ? await averageMetric(reader, { ...query, namespace: "AWS/EC2", metricName: "CPUUtilization" })
        : undefined;
      const avgMemoryPercent = running
        ? await averageMetric(reader, { ...query, namespace: "CWAgent", metricName: "mem_used_percent" })
        : undefined;

      samples.push({
        resourceId: instance.InstanceId,
        provider: "AWS",
        kind: "COMPUTE",
        avgCpuPercent,
        avgMemoryPercent,
        hourlyCost: lookupRate(EC2_HOURLY, instance.InstanceType),
        isAttachedOrRunning: running,
        observationWindowHours: window.hours,
        name: tagValue(instance.Tags, "Name"),
        location: instance.Placement?.AvailabilityZone ?? this.options.region,
        attributes: { instanceType: instance.InstanceType ?? "unknown", state },
      });
    }
    return samples;
  }

  // ── EBS ───────────────────────────────────────────────────────────────────

  private async collectVolumes(
    clients: AwsClients,
    window: Window,
    signal?: AbortSignal,
  ): Promise<ResourceSample[]> {
    const volumes: Volume[] = [];
    let nextToken: string | undefined;
    do {
      signal?.throwIfAborted();
      const response = await clients.ec2.send(new DescribeVolumesCommand({ NextToken: nextToken }));
      volumes.push(...(response.Volumes ?? []));
      nextToken = response.NextToken;
    } while (nextToken);

    return volumes.flatMap((volume): ResourceSample[] => {
      if (!volume.VolumeId) return [];
      const sizeGb = volume.Size ?? 0;
      return [
        {
          resourceId: volume.VolumeId,
          provider: "AWS",
          kind: "BLOCK_STORAGE",
          hourlyCost: storageHourlyCost(sizeGb, lookupRate(EBS_GB_MONTH, volume.VolumeType)),
          isAttachedOrRunning: volume.State !== "available",
          observationWindowHours: window.hours,
          name: tagValue(volume.Tags, "Name"),
          location: volume.AvailabilityZone ?? this.options.region,
          attributes: {
            volumeType: volume.VolumeType ?? "unknown",
            sizeGb: String(sizeGb),
            state: volume.State ?? "unknown",
          },
        },
      ];
    });
  }

  // ── RDS ───────────────────────────────────────────────────────────────────

  private async collectDatabases(
    clients: AwsClients,
    reader: MetricReader,
    window: Window,
  ): Promise<ResourceSample[]> {
    const databases: DBInstance[] = [];
    let marker: string | undefined;
    do {
      reader.signal?.throwIfAborted();
      const response = await clients.rds.send(new DescribeDBInstancesCommand({ Marker: marker }));
      databases.push(...(response.DBInstances ?? []));
      marker = response.Marker;
    } while (marker);

    const samples: ResourceSample[] = [];
    for (const db of databases) {
      reader.signal?.throwIfAborted();
      if (!db.DBInstanceIdentifier) continue;
      const status = db.DBInstanceStatus ?? "unknown";
      const running = status === "available";
      const avgCpuPercent = running
        ? await averageMetric(reader, {
            namespace: "AWS/RDS",
            metricName: "CPUUtilization",
            dimensions: [{ Name: "DBInstanceIdentifier", Value: db.DBInstanceIdentifier }],
            start: window.start,
            end: window.end,
            periodSeconds: HOUR_SECONDS,
          })
        : undefined;

      samples.push({
        resourceId: db.DBInstanceIdentifier,
        provider: "AWS",
        kind: "DATABASE",
        avgCpuPercent,
        hourlyCost: lookupRate(RDS_HOURLY, db.DBInstanceClass),
        isAttachedOrRunning: running,
        observationWindowHours: window.hours,
        location: db.AvailabilityZone ?? this.options.region,
        attributes: {
          instanceClass: db.DBInstanceClass ?? "unknown",
          engine: db.Engine ?? "unknown",
          status,
        },
      });
    }
    return samples;
  }

  // ── S3 ────────────────────────────────────────────────────────────────────

  private async lifecycleState(
    clients: AwsClients,
    reader: MetricReader,
    bucket: string,
  ): Promise<LifecycleState> {
    reader.signal?.throwIfAborted();
    try {
      const response = await withTimeout(
        () => clients.s3.send(new GetBucketLifecycleConfigurationCommand({ Bucket: bucket })),
        reader.timeoutMs,
        `S3 lifecycle ${bucket}`,
      );
      return (response.Rules ?? []).length > 0 ? "true" : "false";
    } catch (error) {
      if (isMissingLifecycle(error)) return "false";
      reader.logger.debug?.(`S3 lifecycle ${bucket} unavailable: ${formatErrorMessage(error)}`);
      return "unknown";
    }
  }

  private async collectBuckets(
    clients: AwsClients,
    reader: MetricReader,
    now: Date,
    window: Window,
  ): Promise<ResourceSample[]> {
    reader.signal?.throwIfAborted();
    const response = await clients.s3.send(new ListBucketsCommand({}));
    const start = new Date(now.getTime() - S3_METRIC_WINDOW_HOURS * HOUR_SECONDS * 1000);

    const samples: ResourceSample[] = [];
    for (const bucket of response.Buckets ?? []) {
      reader.signal?.throwIfAborted();
      if (!bucket.Name) continue;
      const query = { namespace: "AWS/S3", start, end: now, periodSeconds: DAY_SECONDS };
      const objectCount = await latestMetric(reader, {
        ...query,
        metricName: "NumberOfObjects",
        dimensions: [
          { Name: "BucketName", Value: bucket.Name },
          { Name: "StorageType", Value: "AllStorageTypes" },
        ],
      });
      const sizeBytes = await latestMetric(reader, {
        ...query,
        metricName: "BucketSizeBytes",
        dimensions: [
          { Name: "BucketName", Value: bucket.Name },
          { Name: "StorageType", Value: "StandardStorage" },
        ],
      });
      const hasLifecycle = await this.lifecycleState(clients, reader, bucket.Name);

      samples.push({
        resourceId: bucket.Name,
        provider: "AWS",
        kind: "OBJECT_STORE",
        hourlyCost: storageHourlyCost((sizeBytes ?? 0) / BYTES_PER_GB, S3_STANDARD_GB_MONTH),
        // No object-count datapoint means the bucket is treated as in use.
        isAttachedOrRunning: objectCount === undefined || objectCount > 0,
        observationWindowHours: window.hours,
        location: this.options.region,
        attributes: {
          objectCount: objectCount === undefined ? "unknown" : String(objectCount),
          hasLifecycle,
        },
      });
    }
    return samples;
  }
}
