/**
 * EC2 instance metadata
 */

import {
  EC2Client,
  DescribeInstancesCommand,
  type Instance,
} from "@aws-sdk/client-ec2";
import type { ComputeMetadataPort } from "../types";
import { hasErrorName } from "../types";
import type { ResourceMetadata } from "../../types/context";

export interface Ec2MetadataConfig {
  region?: string;
  client?: EC2Client;
}

export function instanceToMetadata(instance: Instance, resourceId: string): ResourceMetadata {
  const tags: Record<string, string> = {};
  for (const tag of instance.Tags || []) {
    if (tag.Key) {
      tags[tag.Key] = tag.Value ?? "";
    }
  }

  return {
    id: instance.InstanceId ?? resourceId,
    displayName: tags.Name || instance.InstanceId || resourceId,
    shape: instance.InstanceType,
    availabilityZone: instance.Placement?.AvailabilityZone,
    tags,
  };
}

export class Ec2ComputeMetadata implements ComputeMetadataPort {
  private client: EC2Client;

  constructor(config: Ec2MetadataConfig = {}) {
    this.client = config.client ?? new EC2Client({ region: config.region });
  }

  async get(resourceId: string): Promise<ResourceMetadata | null> {
    try {
      const result = await this.client.send(
        new DescribeInstancesCommand({ InstanceIds: [resourceId] })
      );
      const instance = result.Reservations?.[0]?.Instances?.[0];
      return instance ? instanceToMetadata(instance, resourceId) : null;
    } catch (error) {
      if (hasErrorName(error, "InvalidInstanceID.NotFound", "InvalidInstanceID.Malformed")) {
        return null;
      }
      throw error;
    }
  }
}
