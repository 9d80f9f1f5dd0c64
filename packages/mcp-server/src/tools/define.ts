/**
 * ツール定義ヘルパー
 *
 * 引数スキーマはzodで一度だけ書き、検証・デフォルト適用とカタログ用の引数定義の両方をそこから作る。
 */

import { z } from 'zod';
import type { IndexConnection } from '@recoll-search/types';
import type {
  BindResult,
  ParameterSpec,
  ParameterType,
  RegisteredTool,
  ToolInvocation,
  ToolResponse,
} from './types.js';

/**
 * ツール仕様
 */
export interface ToolSpec<Shape extends z.ZodRawShape> {
  name: string;
  description: string;
  inputSchema: Shape;
}

type ToolArgs<Shape extends z.ZodRawShape> = z.output<z.ZodObject<Shape>>;

/**
 * インデックスを使うツールを定義
 */
export function defineIndexTool<Shape extends z.ZodRawShape>(
  spec: ToolSpec<Shape>,
  handler: (args: ToolArgs<Shape>, connection: IndexConnection) => Promise<ToolResponse>
): RegisteredTool {
  return createTool(spec, true, (args) => ({
    requiresIndex: true,
    run: (connection) => handler(args, connection),
  }));
}

/**
 * インデックスを使わないツールを定義
 */
export function defineFileTool<Shape extends z.ZodRawShape>(
  spec: ToolSpec<Shape>,
  handler: (args: ToolArgs<Shape>) => Promise<ToolResponse>
): RegisteredTool {
  return createTool(spec, false, (args) => ({
    requiresIndex: false,
    run: () => handler(args),
  }));
}

function createTool<Shape extends z.ZodRawShape>(
  spec: ToolSpec<Shape>,
  requiresIndex: boolean,
  toInvocation: (args: ToolArgs<Shape>) => ToolInvocation
): RegisteredTool {
  const schema = z.object(spec.inputSchema);

  return {
    definition: {
      name: spec.name,
      description: spec.description,
      parameters: describeParameters(spec.inputSchema),
      requiresIndex,
    },
    bind(args: Record<string, unknown>): BindResult {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        return { ok: false, error: formatIssues(parsed.error) };
      }
      return { ok: true, invocation: toInvocation(parsed.data) };
    },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * zodの引数スキーマから引数定義を作る
 *
 * 対応する型は string / integer / boolean のみ。
 */
export function describeParameters(shape: z.ZodRawShape): ParameterSpec[] {
  return Object.entries(shape).map(([name, schema]) => describeParameter(name, schema));
}

function describeParameter(name: string, schema: z.ZodTypeAny): ParameterSpec {
  let inner: z.ZodTypeAny = schema;
  let required = true;
  let defaultValue: string | number | boolean | undefined;

  // optional / nullable / default を剥がす（nullは未指定と同じ扱い）
  while (inner instanceof z.ZodDefault || inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) {
    if (inner instanceof z.ZodDefault) {
      required = false;
      const value: unknown = inner._def.defaultValue();
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        defaultValue = value;
      }
      inner = inner._def.innerType;
    } else if (inner instanceof z.ZodOptional) {
      required = false;
      inner = inner.unwrap();
    } else {
      inner = inner.unwrap();
    }
  }

  const spec: ParameterSpec = {
    name,
    type: parameterType(name, inner),
    required,
  };

  const description = schema.description ?? inner.description;
  if (description !== undefined) {
    spec.description = description;
  }
  if (defaultValue !== undefined) {
    spec.default = defaultValue;
  }

  return spec;
}

function parameterType(name: string, schema: z.ZodTypeAny): ParameterType {
  if (schema instanceof z.ZodString) {
    return 'string';
  }
  if (schema instanceof z.ZodNumber && schema.isInt) {
    return 'integer';
  }
  if (schema instanceof z.ZodBoolean) {
    return 'boolean';
  }
  throw new Error(`Unsupported parameter type for "${name}"`);
}
