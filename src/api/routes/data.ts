import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { Account } from '../../models/Account';
import { RawChainSchema, toActionChain, validateActionChain } from '../../services/ChainValidator';
import { DataManager } from '../../services/DataManager';

export interface DataRoutesOptions {
  dataManager: DataManager;
}

const createAccountSchema = z.object({
  username: z.string(),
  password: z.string(),
  proxy: z.string().optional(),
});

const accountStatusSchema = z.object({
  status: z.enum(['active', 'disabled']),
});

const addTargetsSchema = z.object({
  targets: z.array(z.string()).min(1),
});

const chainSchema = z.object({
  chain: RawChainSchema,
});

const textTypeSchema = z.enum(['storyReplies', 'directMessages']);

const textParamsSchema = z.object({
  type: textTypeSchema,
});

const textIndexParamsSchema = z.object({
  type: textTypeSchema,
  index: z.coerce.number().int().nonnegative(),
});

const addTextSchema = z.object({
  text: z.string(),
});

function withoutPassword(account: Account): Omit<Account, 'password'> {
  const { password: _password, ...rest } = account;
  return rest;
}

export async function dataRoutes(fastify: FastifyInstance, options: DataRoutesOptions): Promise<void> {
  const { dataManager } = options;

  // Accounts

  fastify.get('/api/accounts', async (_request, reply) => {
    return reply.send(dataManager.getAccounts().map(withoutPassword));
  });

  fastify.post('/api/accounts', async (request, reply) => {
    const body = createAccountSchema.parse(request.body);
    const account = await dataManager.addAccount(body);
    return reply.code(201).send(withoutPassword(account));
  });

  fastify.patch<{ Params: { username: string } }>('/api/accounts/:username', async (request, reply) => {
    const body = accountStatusSchema.parse(request.body);
    const updated = await dataManager.setAccountStatus(request.params.username, body.status);
    if (!updated) {
      return reply.code(404).send({ error: 'Account not found' });
    }
    return reply.send({ username: request.params.username, status: body.status });
  });

  fastify.delete<{ Params: { username: string } }>('/api/accounts/:username', async (request, reply) => {
    const removed = await dataManager.removeAccount(request.params.username);
    if (!removed) {
      return reply.code(404).send({ error: 'Account not found' });
    }
    return reply.code(204).send();
  });

  // Targets

  fastify.get('/api/targets', async (_request, reply) => {
    return reply.send(dataManager.getTargets());
  });

  fastify.post('/api/targets', async (request, reply) => {
    const body = addTargetsSchema.parse(request.body);
    const added = await dataManager.bulkAddTargets(body.targets);
    return reply.send({ added, total: dataManager.getTargets().length });
  });

  fastify.delete<{ Params: { target: string } }>('/api/targets/:target', async (request, reply) => {
    const removed = await dataManager.removeTarget(request.params.target);
    if (!removed) {
      return reply.code(404).send({ error: 'Target not found' });
    }
    return reply.code(204).send();
  });

  // Action chain

  fastify.get('/api/chain', async (_request, reply) => {
    const chain = dataManager.getActionChain();
    return reply.send({ chain, validation: validateActionChain(chain) });
  });

  fastify.put('/api/chain', async (request, reply) => {
    const body = chainSchema.parse(request.body);
    const validation = validateActionChain(body.chain);
    if (!validation.valid) {
      return reply.code(400).send({
        error: 'Invalid action chain',
        errors: validation.errors,
        warnings: validation.warnings,
      });
    }
    const chain = toActionChain(body.chain);
    await dataManager.setActionChain(chain);
    return reply.send({ chain, validation });
  });

  // Texts

  fastify.get('/api/texts', async (_request, reply) => {
    return reply.send(dataManager.getTexts());
  });

  fastify.post('/api/texts/:type', async (request, reply) => {
    const { type } = textParamsSchema.parse(request.params);
    const body = addTextSchema.parse(request.body);
    const added = await dataManager.addText(type, body.text);
    if (!added) {
      return reply.code(409).send({ error: 'Text already exists' });
    }
    return reply.code(201).send(dataManager.getTexts()[type]);
  });

  fastify.delete('/api/texts/:type/:index', async (request, reply) => {
    const { type, index } = textIndexParamsSchema.parse(request.params);
    const removed = await dataManager.removeText(type, index);
    if (!removed) {
      return reply.code(404).send({ error: 'Text not found' });
    }
    return reply.code(204).send();
  });
}
