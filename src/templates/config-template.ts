import { ProvisionerConfig } from '../config/types';

/**
 * Text of a starter `provisioner.yml`. The GitHub token is never written to
 * the file.
 */
export function renderConfigFile(config: ProvisionerConfig): string {
  const { aws, stack, github, credentials, encryption } = config;

  return `# CI secret provisioner configuration
# Generated on ${new Date().toISOString()}

aws:
  region: ${aws.region}
${aws.profile ? `  profile: ${aws.profile}` : '  # profile: default  # Uncomment to use a specific AWS profile'}
  iam_username: ${aws.iam_username}

stack:
  name: ${stack.name}
  template: ${stack.template}
  poll_interval_ms: ${stack.poll_interval_ms}
  max_wait_ms: ${stack.max_wait_ms}

github:
${github.owner ? `  owner: ${github.owner}` : '  # owner: my-org'}
${github.repo ? `  repo: ${github.repo}` : '  # repo: my-repo'}
  # token is read from GH_SECRET_TOKEN or --gh-token
  api_url: ${github.api_url}

credentials:
  prune_existing_keys: ${credentials.prune_existing_keys}
  max_active_keys: ${credentials.max_active_keys}

encryption:
  oaep_hash: ${encryption.oaep_hash}
`;
}
