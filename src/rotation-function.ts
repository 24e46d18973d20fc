import { Duration } from 'aws-cdk-lib'
import * as ec2 from 'aws-cdk-lib/aws-ec2'
import { Runtime } from 'aws-cdk-lib/aws-lambda'
import { NodejsFunction } from 'aws-cdk-lib/aws-lambda-nodejs'
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager'
import { Construct } from 'constructs'
import type { LogLevel } from './lambda/runtime/logger'

/**
 * Properties for the RotationFunction construct.
 */
export interface RotationFunctionProps {
  /**
   * The secret to rotate.
   */
  readonly secret: secretsmanager.ISecret

  /**
   * Path to the TypeScript or JavaScript file exporting the handler, usually
   * `export const handler = createHandler(new RotationRunner(...))`.
   */
  readonly entry: string

  /**
   * Name of the exported handler function.
   *
   * @default 'handler'
   */
  readonly handler?: string

  /**
   * Time between scheduled rotations.
   *
   * @default Duration.days(30)
   */
  readonly automaticallyAfter?: Duration

  /**
   * Rotate as soon as the rotation schedule is created or updated.
   *
   * @default true
   */
  readonly rotateImmediatelyOnUpdate?: boolean

  /**
   * Function timeout. The runtime fails an invocation 100 ms before it so that
   * a timeout is reported as an error.
   *
   * @default Duration.seconds(30)
   */
  readonly timeout?: Duration

  /**
   * @default 256
   */
  readonly memorySize?: number

  /**
   * Minimum level written by the runtime's logger.
   *
   * @default 'info'
   */
  readonly logLevel?: LogLevel

  /**
   * Additional environment variables for the function.
   *
   * @default - none
   */
  readonly environment?: Record<string, string>

  /**
   * VPC to place the function in, for services that are only reachable
   * privately (e.g. an RDS instance). A Secrets Manager interface endpoint
   * is added so the function can reach the store without internet access.
   *
   * @default - the function runs outside a VPC
   */
  readonly vpc?: ec2.IVpc
}

/**
 * A Lambda function that rotates a Secrets Manager secret, attached to the
 * secret through a rotation schedule.
 */
export class RotationFunction extends Construct {
  /**
   * The rotation Lambda function.
   */
  public readonly function: NodejsFunction

  /**
   * The rotation schedule attached to the secret.
   */
  public readonly rotationSchedule: secretsmanager.RotationSchedule

  /**
   * Security group of the function. Undefined when no VPC is given.
   */
  public readonly securityGroup: ec2.ISecurityGroup | undefined

  constructor(scope: Construct, id: string, props: RotationFunctionProps) {
    super(scope, id)

    // ─── VPC Configuration (optional) ────────────────────────────
    if (props.vpc) {
      const securityGroup = new ec2.SecurityGroup(this, 'SecurityGroup', {
        vpc: props.vpc,
        description: 'Security group for the secret rotation function',
        allowAllOutbound: true,
      })
      this.securityGroup = securityGroup

      props.vpc.addInterfaceEndpoint('SecretsManagerEndpoint', {
        service: ec2.InterfaceVpcEndpointAwsService.SECRETS_MANAGER,
        securityGroups: [securityGroup],
      })
    }

    // ─── Lambda Function (NodejsFunction with esbuild) ─────────
    this.function = new NodejsFunction(this, 'Function', {
      runtime: Runtime.NODEJS_20_X,
      entry: props.entry,
      handler: props.handler ?? 'handler',
      environment: {
        ...props.environment,
        LOG_LEVEL: props.logLevel ?? 'info',
      },
      timeout: props.timeout ?? Duration.seconds(30),
      memorySize: props.memorySize ?? 256,
      bundling: {
        externalModules: [],
        minify: true,
        sourceMap: true,
      },
      ...(props.vpc && this.securityGroup
        ? {
          vpc: props.vpc,
          vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS },
          securityGroups: [this.securityGroup],
        }
        : {}),
    })

    // ─── Rotation schedule ─────────────────────────────────────
    // Grants the function read/write on the secret, GetRandomPassword and
    // UpdateSecretVersionStage, and lets Secrets Manager invoke it.
    this.rotationSchedule = props.secret.addRotationSchedule('RotationSchedule', {
      rotationLambda: this.function,
      automaticallyAfter: props.automaticallyAfter ?? Duration.days(30),
      rotateImmediatelyOnUpdate: props.rotateImmediatelyOnUpdate ?? true,
    })
  }
}
