/** Read-only queries against the cloud account an agent is deployed into. */
export type CloudResourceInspector = {
  isEncrypted: (bucket: string) => Promise<boolean>;
  blocksPublicAccess: (bucket: string) => Promise<boolean>;
  hasVersioning: (bucket: string) => Promise<boolean>;
  isKeyEnabled: (keyId: string) => Promise<boolean>;
  hasRotationEnabled: (keyId: string) => Promise<boolean>;
  /** False when the key policy allows a wildcard principal. */
  hasScopedKeyPolicy: (keyId: string) => Promise<boolean>;
  isLoggingEnabled: (trailName: string) => Promise<boolean>;
  hasLogValidation: (trailName: string) => Promise<boolean>;
  isTrailEncrypted: (trailName: string) => Promise<boolean>;
  /** False when a policy attached to the role allows `Resource: "*"`. */
  hasScopedRoleResources: (roleName: string) => Promise<boolean>;
  /** False when a policy attached to the role allows a service-wide action such as `s3:*`. */
  avoidsBroadActions: (roleName: string) => Promise<boolean>;
  usesCustomerManagedKey: (secretId: string) => Promise<boolean>;
  hasSecretRotation: (secretId: string) => Promise<boolean>;
};

export type ResourceInventory = {
  buckets: string[];
  kmsKeys: string[];
  trails: string[];
  iamRoles: string[];
  secrets: string[];
};
