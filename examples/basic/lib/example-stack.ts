import * as path from 'path'
import * as cdk from 'aws-cdk-lib'
import * as ec2 from 'aws-cdk-lib/aws-ec2'
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager'
import { Construct } from 'constructs'
import { RotationFunction } from '../../../src'

export interface ExampleStackProps extends cdk.StackProps {
  /** Host name of the PostgreSQL server whose app user is rotated. */
  readonly databaseHost: string
}

export class ExampleStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: ExampleStackProps) {
    super(scope, id, props)

    const vpc = new ec2.Vpc(this, 'Vpc', { maxAzs: 2, natGateways: 1 })

    const secret = new secretsmanager.Secret(this, 'AppUserSecret', {
      description: 'Credentials of the application database user',
      generateSecretString: {
        secretStringTemplate: JSON.stringify({
          host: props.databaseHost,
          port: 5432,
          database: 'app',
          user: 'app_user',
        }),
        generateStringKey: 'password',
        excludeCharacters: '"',
      },
    })

    // Rotates the password every week, starting right after deployment
    new RotationFunction(this, 'AppUserRotation', {
      secret,
      entry: path.join(__dirname, '../../postgres-rotation/handler.ts'),
      automaticallyAfter: cdk.Duration.days(7),
      timeout: cdk.Duration.seconds(60),
      vpc,
    })
  }
}
