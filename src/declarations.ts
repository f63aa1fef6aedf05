import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { HTTP_METHODS } from './endpoint.js';
import { MockServerError } from './errors.js';
import { matchHeaders, matchJsonBody, matchQueryParams, type Matcher } from './matchers.js';
import { headers, jsonBody, jsonFileBody, statusCode, stringBody, type Responder } from './responders.js';
import type { MockServer } from './server.js';

const valueListSchema = z.record(z.union([z.string(), z.array(z.string())]));

const matchSchema = z
  .object({
    query: valueListSchema.optional(),
    headers: valueListSchema.optional(),
    json: z.unknown().optional()
  })
  .strict();

const respondSchema = z
  .object({
    status: z.number().int().min(100).max(599).optional(),
    headers: valueListSchema.optional(),
    json: z.unknown().optional(),
    jsonFile: z.string().min(1).optional(),
    body: z.string().optional()
  })
  .strict()
  .refine((value) => [value.json, value.jsonFile, value.body].filter((item) => item !== undefined).length <= 1, {
    message: 'Only one of json, jsonFile and body may be set'
  });

const scenarioSchema = z
  .object({
    times: z.number().int().min(1).default(1),
    match: matchSchema.optional(),
    respond: respondSchema
  })
  .strict();

const endpointSchema = z
  .object({
    method: z.preprocess((value) => (typeof value === 'string' ? value.toUpperCase() : value), z.enum(HTTP_METHODS)),
    path: z.string().startsWith('/'),
    scenarios: z.array(scenarioSchema).min(1)
  })
  .strict();

export const declarationFileSchema = z
  .object({
    endpoints: z.array(endpointSchema)
  })
  .strict();

export type DeclarationFile = z.infer<typeof declarationFileSchema>;
export type ScenarioDeclaration = z.infer<typeof scenarioSchema>;

export function parseDeclarations(input: unknown): DeclarationFile {
  const result = declarationFileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new MockServerError({
      code: 'INVALID_DECLARATION',
      message: `Invalid mock declarations:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
      cause: result.error
    });
  }
  return result.data;
}

export async function loadDeclarations(filePath: string): Promise<DeclarationFile> {
  const raw = await fs.readFile(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MockServerError({
      code: 'INVALID_DECLARATION',
      message: `Mock declarations in ${filePath} are not valid JSON: ${(error as Error).message}`,
      cause: error
    });
  }
  return parseDeclarations(parsed);
}

function matchersFor(scenario: ScenarioDeclaration): Matcher[] {
  const matchers: Matcher[] = [];
  const match = scenario.match;
  if (!match) return matchers;
  if (match.query) matchers.push(matchQueryParams(match.query));
  if (match.headers) matchers.push(matchHeaders(match.headers));
  if (match.json !== undefined) matchers.push(matchJsonBody(match.json));
  return matchers;
}

function respondersFor(scenario: ScenarioDeclaration, baseDir: string): Responder[] {
  const respond = scenario.respond;
  const responders: Responder[] = [];
  if (respond.status !== undefined) responders.push(statusCode(respond.status));
  if (respond.headers) responders.push(headers(respond.headers));
  if (respond.json !== undefined) responders.push(jsonBody(respond.json));
  if (respond.jsonFile) responders.push(jsonFileBody(path.resolve(baseDir, respond.jsonFile)));
  if (respond.body !== undefined) responders.push(stringBody(respond.body));
  return responders;
}

/** Registers every declared scenario, in file order. `jsonFile` paths resolve against `baseDir`. */
export function registerDeclarations(server: MockServer, declarations: DeclarationFile, baseDir: string) {
  for (const endpoint of declarations.endpoints) {
    for (const scenario of endpoint.scenarios) {
      server
        .register(endpoint.method, endpoint.path, matchersFor(scenario))
        .times(scenario.times)
        .respond(...respondersFor(scenario, baseDir));
    }
  }
}
