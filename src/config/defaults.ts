import type { OrchestratorConfig } from '../types';

export const DEFAULT_CONFIG_FILE = 'orchestrator.yml';

/**
 * Every setting except the state backend names, which are derived from
 * `project` when the file leaves them out.
 */
export const DEFAULT_CONFIG: Omit<OrchestratorConfig, 'backend'> = {
  project: 'eks-lab',
  aws: {
    region: 'us-east-1'
  },
  cluster: {
    name: 'eks-mundos-e',
    node_type: 't3.small',
    node_count: 3,
    zones: ['us-east-1a', 'us-east-1b', 'us-east-1c'],
    ssh_key_name: 'pin',
    ssh_key_dir: '~/.ssh'
  },
  terraform: {
    root_dir: '.',
    backend_dir: '00_terraform_backend',
    workstation_dir: '01_ec2_workstation',
    eks_infrastructure_dir: '01_eks_infrastructure'
  },
  workstation: {
    name_tag: 'DevOps-Workstation'
  },
  access: {
    role_arn_output: 'role_arn',
    cluster_name_output: 'cluster_name',
    session_name: 'eks-admin',
    duration_seconds: 3600
  },
  smoke_test: {
    name: 'nginx',
    namespace: 'default',
    image: 'nginx',
    expected_body: 'Welcome to nginx'
  },
  storage: {
    storage_class: 'ebs-sc',
    volume_type: 'gp3',
    encrypted: true,
    csi_role_name: 'AmazonEKS_EBS_CSI_DriverRole',
    csi_policy_arn: 'arn:aws:iam::aws:policy/service-role/AmazonEBSCSIDriverPolicy',
    addon_name: 'aws-ebs-csi-driver'
  },
  monitoring: {
    prometheus: {
      namespace: 'prometheus',
      release: 'prometheus',
      repo_name: 'prometheus-community',
      repo_url: 'https://prometheus-community.github.io/helm-charts',
      chart: 'prometheus',
      volume_size: '10Gi',
      external_service: 'prometheus-external'
    },
    grafana: {
      namespace: 'grafana',
      release: 'grafana',
      repo_name: 'grafana',
      repo_url: 'https://grafana.github.io/helm-charts',
      chart: 'grafana',
      volume_size: '10Gi',
      admin_password: '${GRAFANA_ADMIN_PASSWORD:-admin}',
      dashboards: [
        { name: 'cluster-monitoring', gnet_id: 3119, revision: 2 },
        { name: 'pod-monitoring', gnet_id: 6417, revision: 1 }
      ]
    }
  },
  orchestration: {
    confirmation: 'prompt',
    poll_interval_seconds: 10,
    max_attempts: 30,
    pod_attempts: 20
  }
};
