import { stringify as stringifyYaml } from 'yaml';
import { ProvisionerConfig } from '../config/types';
import { CloudFormationTemplate, TemplateFormat } from './types';

export const DEPLOYER_USER_RESOURCE = 'DeployerUser';

/**
 * Starting template for the pre-apply stack: the IAM user whose access keys
 * are issued and published to CI.
 */
export function generateBaselineTemplate(config: ProvisionerConfig): CloudFormationTemplate {
  return {
    AWSTemplateFormatVersion: '2010-09-09',
    Description: `Pre-apply resources for CI deployments (stack ${config.stack.name})`,
    Parameters: {
      DeployerUserName: {
        Type: 'String',
        Default: config.aws.iam_username,
        Description: 'Name of the IAM user used by CI workflows'
      }
    },
    Resources: {
      [DEPLOYER_USER_RESOURCE]: {
        Type: 'AWS::IAM::User',
        Properties: {
          UserName: { Ref: 'DeployerUserName' },
          Tags: [{ Key: 'ManagedBy', Value: 'ci-secret-provisioner' }]
        }
      }
    },
    Outputs: {
      DeployerUserArn: {
        Description: 'ARN of the CI deployer user',
        Value: { 'Fn::GetAtt': [DEPLOYER_USER_RESOURCE, 'Arn'] },
        Export: { Name: { 'Fn::Sub': '${AWS::StackName}-DeployerUserArn' } }
      }
    }
  };
}

export function templateFormatFor(path: string): TemplateFormat {
  return path.endsWith('.json') ? 'json' : 'yaml';
}

export function serializeTemplate(template: CloudFormationTemplate, format: TemplateFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(template, null, 2)}\n`;
  }
  return stringifyYaml(template);
}
