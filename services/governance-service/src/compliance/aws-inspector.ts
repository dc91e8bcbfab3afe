import { CloudTrailClient, DescribeTrailsCommand, GetTrailStatusCommand } from "@aws-sdk/client-cloudtrail";
import {
  GetPolicyCommand,
  GetPolicyVersionCommand,
  IAMClient,
  ListAttachedRolePoliciesCommand
} from "@aws-sdk/client-iam";
import { DescribeKeyCommand, GetKeyPolicyCommand, GetKeyRotationStatusCommand, KMSClient } from "@aws-sdk/client-kms";
import {
  GetBucketEncryptionCommand,
  GetBucketVersioningCommand,
  GetPublicAccessBlockCommand,
  S3Client
} from "@aws-sdk/client-s3";
import { DescribeSecretCommand, SecretsManagerClient } from "@aws-sdk/client-secrets-manager";
import { fromEnv, fromIni } from "@aws-sdk/credential-providers";
import type { CloudResourceInspector } from "./inspector";
import {
  allowsWildcardPrincipal,
  allowsWildcardResource,
  broadActions,
  parsePolicyDocument,
  type PolicyStatement
} from "./policy-document";

export type AwsInspectorConfig = {
  region: string;
  profile?: string;
};

function hasErrorName(error: unknown, name: string): boolean {
  return error instanceof Error && error.name === name;
}

export class AwsResourceInspector implements CloudResourceInspector {
  private readonly s3: S3Client;
  private readonly kms: KMSClient;
  private readonly cloudTrail: CloudTrailClient;
  private readonly iam: IAMClient;
  private readonly secrets: SecretsManagerClient;

  constructor(config: AwsInspectorConfig) {
    const clientConfig = {
      region: config.region,
      credentials: config.profile ? fromIni({ profile: config.profile }) : fromEnv()
    };
    this.s3 = new S3Client(clientConfig);
    this.kms = new KMSClient(clientConfig);
    this.cloudTrail = new CloudTrailClient(clientConfig);
    this.iam = new IAMClient(clientConfig);
    this.secrets = new SecretsManagerClient(clientConfig);
  }

  async isEncrypted(bucket: string): Promise<boolean> {
    try {
      const response = await this.s3.send(new GetBucketEncryptionCommand({ Bucket: bucket }));
      return (response.ServerSideEncryptionConfiguration?.Rules ?? []).length > 0;
    } catch (error) {
      if (hasErrorName(error, "ServerSideEncryptionConfigurationNotFoundError")) {
        return false;
      }
      throw error;
    }
  }

  async hasRotationEnabled(keyId: string): Promise<boolean> {
    const response = await this.kms.send(new GetKeyRotationStatusCommand({ KeyId: keyId }));
    return response.KeyRotationEnabled === true;
  }

  async isLoggingEnabled(trailName: string): Promise<boolean> {
    const response = await this.cloudTrail.send(new GetTrailStatusCommand({ Name: trailName }));
    return response.IsLogging === true;
  }

  async hasLogValidation(trailName: string): Promise<boolean> {
    const response = await this.cloudTrail.send(new DescribeTrailsCommand({ trailNameList: [trailName] }));
    const trail = response.trailList?.[0];
    return trail?.LogFileValidationEnabled === true;
  }

  async blocksPublicAccess(bucket: string): Promise<boolean> {
    try {
      const response = await this.s3.send(new GetPublicAccessBlockCommand({ Bucket: bucket }));
      const block = response.PublicAccessBlockConfiguration;
      return Boolean(
        block?.BlockPublicAcls && block.BlockPublicPolicy && block.IgnorePublicAcls && block.RestrictPublicBuckets
      );
    } catch (error) {
      if (hasErrorName(error, "NoSuchPublicAccessBlockConfiguration")) {
        return false;
      }
      throw error;
    }
  }

  async hasVersioning(bucket: string): Promise<boolean> {
    const response = await this.s3.send(new GetBucketVersioningCommand({ Bucket: bucket }));
    return response.Status === "Enabled";
  }

  async isKeyEnabled(keyId: string): Promise<boolean> {
    const response = await this.kms.send(new DescribeKeyCommand({ KeyId: keyId }));
    return response.KeyMetadata?.KeyState === "Enabled";
  }

  async hasScopedKeyPolicy(keyId: string): Promise<boolean> {
    const response = await this.kms.send(new GetKeyPolicyCommand({ KeyId: keyId, PolicyName: "default" }));
    return response.Policy ? !allowsWildcardPrincipal(parsePolicyDocument(response.Policy)) : true;
  }

  async isTrailEncrypted(trailName: string): Promise<boolean> {
    const response = await this.cloudTrail.send(new DescribeTrailsCommand({ trailNameList: [trailName] }));
    return Boolean(response.trailList?.[0]?.KmsKeyId);
  }

  async hasScopedRoleResources(roleName: string): Promise<boolean> {
    return !allowsWildcardResource(await this.rolePolicyStatements(roleName));
  }

  async avoidsBroadActions(roleName: string): Promise<boolean> {
    return broadActions(await this.rolePolicyStatements(roleName)).length === 0;
  }

  async usesCustomerManagedKey(secretId: string): Promise<boolean> {
    const response = await this.secrets.send(new DescribeSecretCommand({ SecretId: secretId }));
    return Boolean(response.KmsKeyId);
  }

  async hasSecretRotation(secretId: string): Promise<boolean> {
    const response = await this.secrets.send(new DescribeSecretCommand({ SecretId: secretId }));
    return response.RotationEnabled === true;
  }

  private async rolePolicyStatements(roleName: string): Promise<PolicyStatement[]> {
    const statements: PolicyStatement[] = [];
    let marker: string | undefined;
    do {
      const page = await this.iam.send(new ListAttachedRolePoliciesCommand({ RoleName: roleName, Marker: marker }));
      for (const attached of page.AttachedPolicies ?? []) {
        if (!attached.PolicyArn) {
          continue;
        }
        const policy = await this.iam.send(new GetPolicyCommand({ PolicyArn: attached.PolicyArn }));
        const versionId = policy.Policy?.DefaultVersionId;
        if (!versionId) {
          continue;
        }
        const version = await this.iam.send(new GetPolicyVersionCommand({ PolicyArn: attached.PolicyArn, VersionId: versionId }));
        const document = version.PolicyVersion?.Document;
        if (document) {
          statements.push(...parsePolicyDocument(document));
        }
      }
      marker = page.IsTruncated ? page.Marker : undefined;
    } while (marker);
    return statements;
  }
}
