import Joi from 'joi';
import { ConfigError } from '../orchestration/errors';
import type { ChartConfig, OrchestratorConfig } from '../types';
import type { ConfigValidationResult } from './types';

const kubernetesName = Joi.string()
  .pattern(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/)
  .max(63)
  .messages({
    'string.pattern.base': '{{#label}} must be a lowercase DNS label (letters, digits and hyphens)'
  });

const awsConfigSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z]{2}(-[a-z]+)+-\d$/)
    .required()
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier (e.g., us-east-1)'
    }),
  profile: Joi.string().optional()
});

const clusterConfigSchema = Joi.object({
  name: Joi.string()
    .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
    .max(100)
    .required()
    .messages({
      'string.pattern.base': 'Cluster name must start with a letter and contain only alphanumeric characters and hyphens'
    }),
  node_type: Joi.string().required(),
  node_count: Joi.number().integer().min(1).max(100).required(),
  zones: Joi.array().items(Joi.string()).min(2).required().messages({
    'array.min': 'EKS needs at least 2 availability zones'
  }),
  ssh_key_name: Joi.string().required(),
  ssh_key_dir: Joi.string().required(),
  kubernetes_version: Joi.string()
    .pattern(/^\d+\.\d+$/)
    .optional()
    .messages({
      'string.pattern.base': 'Kubernetes version must look like 1.29'
    })
});

const terraformConfigSchema = Joi.object({
  root_dir: Joi.string().required(),
  backend_dir: Joi.string().required(),
  workstation_dir: Joi.string().required(),
  eks_infrastructure_dir: Joi.string().required()
});

const backendConfigSchema = Joi.object({
  bucket_name: Joi.string()
    .pattern(/^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/)
    .required()
    .messages({
      'string.pattern.base': 'State bucket name must be 3-63 lowercase letters, digits, dots or hyphens'
    }),
  lock_table_name: Joi.string()
    .pattern(/^[a-zA-Z0-9_.-]{3,255}$/)
    .required()
    .messages({
      'string.pattern.base': 'Lock table name must be 3-255 letters, digits, underscores, dots or hyphens'
    })
});

const accessConfigSchema = Joi.object({
  role_arn_output: Joi.string().required(),
  cluster_name_output: Joi.string().required(),
  session_name: Joi.string()
    .pattern(/^[\w+=,.@-]{2,64}$/)
    .required(),
  duration_seconds: Joi.number().integer().min(900).max(43200).required().messages({
    'number.min': 'Session duration must be at least 900 seconds',
    'number.max': 'Session duration must be no more than 43200 seconds (12 hours)'
  })
});

const smokeTestConfigSchema = Joi.object({
  name: kubernetesName.required(),
  namespace: kubernetesName.required(),
  image: Joi.string().required(),
  expected_body: Joi.string().required()
});

const storageConfigSchema = Joi.object({
  storage_class: kubernetesName.required(),
  volume_type: Joi.string().valid('gp2', 'gp3', 'io1', 'io2', 'st1', 'sc1').required(),
  encrypted: Joi.boolean().required(),
  csi_role_name: Joi.string().max(64).required(),
  csi_policy_arn: Joi.string().pattern(/^arn:aws:iam::/).required().messages({
    'string.pattern.base': 'CSI policy must be an IAM policy ARN'
  }),
  addon_name: Joi.string().required()
});

const chartKeys = {
  namespace: kubernetesName.required(),
  release: kubernetesName.required(),
  repo_name: Joi.string().required(),
  repo_url: Joi.string().uri({ scheme: ['http', 'https', 'oci'] }).required(),
  chart: Joi.string().required(),
  chart_version: Joi.string().optional(),
  volume_size: Joi.string()
    .pattern(/^\d+(Mi|Gi|Ti)$/)
    .required()
    .messages({
      'string.pattern.base': 'Volume size must be a quantity such as 10Gi'
    })
} satisfies Record<keyof ChartConfig, Joi.Schema>;

const monitoringConfigSchema = Joi.object({
  prometheus: Joi.object({
    ...chartKeys,
    external_service: kubernetesName.required()
  }).required(),
  grafana: Joi.object({
    ...chartKeys,
    admin_password: Joi.string().min(5).required(),
    dashboards: Joi.array()
      .items(
        Joi.object({
          name: kubernetesName.required(),
          gnet_id: Joi.number().integer().positive().required(),
          revision: Joi.number().integer().positive().required()
        })
      )
      .required()
  }).required()
});

const orchestrationSettingsSchema = Joi.object({
  confirmation: Joi.string().valid('proceed', 'prompt', 'auto-approve').required().messages({
    'any.only': 'Confirmation must be one of: proceed, prompt, auto-approve'
  }),
  poll_interval_seconds: Joi.number().min(0).max(600).required(),
  max_attempts: Joi.number().integer().min(1).required(),
  pod_attempts: Joi.number().integer().min(1).required()
});

const orchestratorConfigSchema = Joi.object<OrchestratorConfig>({
  project: kubernetesName.required(),
  aws: awsConfigSchema.required(),
  cluster: clusterConfigSchema.required(),
  terraform: terraformConfigSchema.required(),
  backend: backendConfigSchema.required(),
  workstation: Joi.object({ name_tag: Joi.string().required() }).required(),
  access: accessConfigSchema.required(),
  smoke_test: smokeTestConfigSchema.required(),
  storage: storageConfigSchema.required(),
  monitoring: monitoringConfigSchema.required(),
  orchestration: orchestrationSettingsSchema.required()
}).unknown(false);

const VALIDATE_OPTIONS: Joi.ValidationOptions = {
  abortEarly: false,
  allowUnknown: false,
  convert: true
};

export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = orchestratorConfigSchema.validate(config, VALIDATE_OPTIONS);
  return {
    valid: !error,
    errors: error ? error.details.map(detail => detail.message) : []
  };
}

/**
 * Validates a fully merged configuration and returns it with joi's
 * conversions applied (numeric strings from env substitution become numbers).
 */
export function validateAndNormalizeConfig(config: unknown): OrchestratorConfig {
  const result = orchestratorConfigSchema.validate(config, VALIDATE_OPTIONS);
  if (result.error === undefined) {
    return result.value;
  }
  const errors = result.error.details.map(detail => detail.message);
  throw new ConfigError(`Configuration validation failed:\n${errors.join('\n')}`);
}

export function getConfigSchema(): Joi.ObjectSchema<OrchestratorConfig> {
  return orchestratorConfigSchema;
}
