import type { RenderableResponse } from './output.js';

export type CommandDescription = {
  command: string;
  payload: Record<string, string>;
  examples: string[];
};

const NAME = 'string, exact key (required)';
const YEARS = 'integer 1-10 (required)';
const AMOUNT = 'non-negative integer';

const DESCRIPTIONS: Record<string, Omit<CommandDescription, 'command'>> = {
  init: {
    payload: { price: `${AMOUNT} (required)`, multiplier: `${AMOUNT} (required)`, admin: 'identity (default: caller)' },
    examples: ['nlr init --price 100 --multiplier 2 --as admin']
  },
  claim: {
    payload: { name: NAME, years: YEARS, amount: `${AMOUNT} (default: 0)` },
    examples: ['nlr claim example --years 2 --amount 200 --as alice --output json']
  },
  renew: {
    payload: { name: NAME, years: YEARS, amount: `${AMOUNT} (default: 0)` },
    examples: ['nlr renew example --years 1 --amount 200 --as alice']
  },
  owner: { payload: { name: NAME }, examples: ['nlr owner example'] },
  info: { payload: { name: NAME }, examples: ['nlr info example --output json'] },
  status: { payload: { name: NAME }, examples: ['nlr status example --now 1700000000'] },
  quote: {
    payload: { kind: 'claim | renew (required)', years: YEARS },
    examples: ['nlr quote claim --years 2', 'nlr quote renew --years 1']
  },
  config: { payload: {}, examples: ['nlr config --output json'] },
  'set-price': { payload: { amount: `${AMOUNT} (required)` }, examples: ['nlr set-price 150 --as admin'] },
  'set-multiplier': {
    payload: { factor: `${AMOUNT} (required)` },
    examples: ['nlr set-multiplier 3 --as admin']
  },
  pause: { payload: {}, examples: ['nlr pause --as admin'] },
  unpause: { payload: {}, examples: ['nlr unpause --as admin'] },
  withdraw: { payload: {}, examples: ['nlr withdraw --as admin'] },
  deposit: { payload: { amount: `${AMOUNT} (required)` }, examples: ['nlr deposit --amount 50 --as alice'] },
  balance: { payload: {}, examples: ['nlr balance'] },
  events: { payload: { limit: 'positive integer (default: 20)' }, examples: ['nlr events --limit 5 --output json'] },
  errors: { payload: {}, examples: ['nlr errors --output json'] },
  help: { payload: { command: 'command name (optional)' }, examples: ['nlr help claim'] }
};

const ROOT_EXAMPLES = [
  'nlr init --price 100 --multiplier 2 --as admin',
  'nlr claim example --years 1 --amount 100 --as alice',
  'nlr status example',
  'nlr renew example --years 1 --amount 200 --as alice',
  'nlr quote renew --years 1',
  'nlr pause --as admin',
  'nlr withdraw --as admin'
];

export const describeCommand = (commandName: string | null): CommandDescription => {
  if (commandName === null) {
    return { command: 'nlr', payload: {}, examples: ROOT_EXAMPLES };
  }

  const description = DESCRIPTIONS[commandName];
  return {
    command: commandName,
    payload: description?.payload ?? {},
    examples: description?.examples ?? [`nlr ${commandName}`]
  };
};

export const toDescribeResponse = (description: CommandDescription): RenderableResponse => {
  const fields = Object.entries(description.payload).map(([field, shape]) => `  ${field}: ${shape}`);
  return {
    id: `${description.command}-describe`,
    ok: true,
    data: description,
    meta: { durationMs: 0 },
    text: [
      description.command,
      ...(fields.length > 0 ? ['payload:', ...fields] : []),
      'examples:',
      ...description.examples.map((example) => `  ${example}`)
    ].join('\n')
  };
};
