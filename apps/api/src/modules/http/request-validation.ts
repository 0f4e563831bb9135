import { BadRequestException, ConflictException, NotFoundException, type HttpException } from "@nestjs/common";
import type { LedgerRejection } from "@paperbot/shared";
import type { z, ZodTypeAny } from "zod";

export function parseOrBadRequest<S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BadRequestException({
      message: "Invalid request",
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
  }
  return parsed.data;
}

export function rejectionToHttp(reason: LedgerRejection, message: string): HttpException {
  switch (reason) {
    case "USER_NOT_FOUND":
      return new NotFoundException(message);
    case "ACCOUNT_EXISTS":
    case "ACCOUNT_LOCKED":
      return new ConflictException(message);
    default:
      return new BadRequestException(message);
  }
}
