import { Client } from 'pg'
import { z } from 'zod'
import { Logger, RotationRunner, updateSecret } from '../../src/lambda'
import type { RotateRunner, SecretContainer, SecretStoreGateway } from '../../src/lambda'

export const PostgresSecret = z.object({
  host: z.string(),
  port: z.number().int().default(5432),
  database: z.string(),
  user: z.string(),
  password: z.string(),
})

export type PostgresSecret = z.infer<typeof PostgresSecret>

type Container = SecretContainer<PostgresSecret>

const logger = new Logger('postgres-rotation')

async function withConnection<T>(
  secret: PostgresSecret,
  work: (client: Client) => Promise<T>,
): Promise<T> {
  const client = new Client({
    host: secret.host,
    port: secret.port,
    database: secret.database,
    user: secret.user,
    password: secret.password,
    ssl: { rejectUnauthorized: false },
    connectionTimeoutMillis: 5_000,
  })
  await client.connect()
  try {
    return await work(client)
  } finally {
    await client.end()
  }
}

/**
 * Rotates the password of a PostgreSQL login role. The secret holds the
 * connection parameters of that role, and the role changes its own password.
 */
export class PostgresRotator implements RotateRunner<void, PostgresSecret> {
  readonly secretSchema = PostgresSecret

  async setup(): Promise<void> {
    logger.info('Postgres rotation ready')
  }

  async create(
    _shared: void,
    current: Container,
    store: SecretStoreGateway,
  ): Promise<Container> {
    const password = await store.generatePassword({ excludePunctuation: false })
    return updateSecret(current, { password })
  }

  async set(_shared: void, current: Container, pending: Container): Promise<void> {
    await withConnection(current.data, async (client) => {
      const role = client.escapeIdentifier(pending.data.user)
      const password = client.escapeLiteral(pending.data.password)
      await client.query(`ALTER USER ${role} WITH PASSWORD ${password}`)
    })
    logger.info('Changed user password', { user: pending.data.user })
  }

  async test(_shared: void, pending: Container): Promise<void> {
    await withConnection(pending.data, (client) => client.query('SELECT 1'))
  }
}

export const runner = new RotationRunner(new PostgresRotator())
