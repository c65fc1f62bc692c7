// Library entry point; the command-line tool lives in cli.ts
export * from './types';
export * from './config/defaults';
export * from './config/loader';
export * from './config/starter';
export * from './config/validator';
export type { ConfigValidationResult, ConfigLoader, RawConfig } from './config/types';
export * from './logging/logger';
export * from './orchestration';
export * from './preconditions/checker';
export * from './pipelines/registry';
export * from './pipelines/services';
export * from './provisioning/clients';
export * from './provisioning/credentials';
export * from './provisioning/eks-manager';
export * from './provisioning/eksctl';
export * from './provisioning/exec';
export * from './provisioning/helm';
export * from './provisioning/http';
export * from './provisioning/iam-manager';
export * from './provisioning/inventory';
export * from './provisioning/kubectl';
export * from './provisioning/s3-manager';
export * from './provisioning/terraform';
export type * from './provisioning/types';
export * from './templates/template-engine';
export * from './templates/manifests';
export * from './templates/helm-values';
export type * from './templates/types';
