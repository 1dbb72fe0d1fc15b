import { z } from 'zod';
import { ValidationError } from '../lib/sanitization';

/**
 * Base class for every action exposed to an agent: a name, a prompt-style
 * description, a zod schema, and a function returning a string.
 */
export abstract class RemoteAction<TArgs> {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;

  protected abstract run(args: TArgs): Promise<string>;

  /**
   * Parse raw input against the schema
   */
  validate(input: unknown): TArgs {
    const parsed = this.argsSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join('.')}: ${issue.message}`
            : issue.message
        )
        .join('; ');
      throw new ValidationError(`Invalid arguments: ${issues}`);
    }
    return parsed.data;
  }

  async execute(input: unknown): Promise<string> {
    return this.run(this.validate(input));
  }
}
