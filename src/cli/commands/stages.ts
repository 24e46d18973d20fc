import { Command } from 'commander'
import { SecretsManagerGateway } from '../../lambda/rotate/secrets-manager-gateway'
import type { SecretVersionStages } from '../../lambda/rotate/secrets-manager-gateway'

interface StagesOptions {
  secretId: string
  region?: string
}

export function formatStages(versions: SecretVersionStages[]): string[] {
  const lines = [
    `  ${'Version'.padEnd(38)} ${'Created'.padEnd(25)} Stages`,
    `  ${'─'.repeat(38)} ${'─'.repeat(25)} ${'─'.repeat(30)}`,
  ]
  for (const v of versions) {
    const created = v.createdAt ? v.createdAt.toISOString() : '?'
    const stages = v.stages.length > 0 ? v.stages.join(', ') : '(none)'
    lines.push(`  ${v.versionId.padEnd(38)} ${created.padEnd(25)} ${stages}`)
  }
  return lines
}

export function registerStagesCommand(program: Command): void {
  program
    .command('stages')
    .description(
      'Show which versions of a secret carry AWSCURRENT, AWSPENDING and AWSPREVIOUS',
    )
    .requiredOption('-s, --secret-id <id>', 'Secret name or ARN')
    .option('--region <region>', 'AWS region (default: AWS_REGION)')
    .action(async (opts: StagesOptions) => {
      const region = opts.region ?? process.env.AWS_REGION
      const gateway = new SecretsManagerGateway({ region })
      const versions = await gateway.describeVersions(opts.secretId)

      if (versions.length === 0) {
        console.log(`No versions found for ${opts.secretId}`)
        return
      }

      console.log(`Versions of ${opts.secretId}\n`)
      for (const line of formatStages(versions)) {
        console.log(line)
      }
    })
}
