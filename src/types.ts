import { Buffer } from "node:buffer";

import * as z from "zod/mini";

export type AuthenticationMD5Password = {
  salt: Buffer;
};

export const zAuthenticationMD5Password: z.ZodMiniType<
  AuthenticationMD5Password
> = z.object({
  salt: z.custom<Buffer>((v) => v instanceof Buffer),
});

export type AuthenticationSASL = {
  mechanisms: string[];
};

export const zAuthenticationSASL: z.ZodMiniType<AuthenticationSASL> = z
  .object({
    mechanisms: z.array(z.string()),
  });

export type AuthenticationSASLContinue = {
  data: string;
};

export const zAuthenticationSASLContinue: z.ZodMiniType<
  AuthenticationSASLContinue
> = z.object({
  data: z.string(),
});

export type AuthenticationSASLFinal = {
  data: string;
};

export const zAuthenticationSASLFinal: z.ZodMiniType<
  AuthenticationSASLFinal
> = z.object({
  data: z.string(),
});

export type RowDescriptionMessage = {
  fieldCount: number;
  fields: {
    name: string;
    tableID: number;
    columnID: number;
    dataTypeID: number;
    dataTypeSize: number;
    dataTypeModifier: number;
    format: "text" | "binary";
  }[];
};

export const zRowDescriptionMessage: z.ZodMiniType<RowDescriptionMessage> = z
  .object({
    fieldCount: z.number(),
    fields: z.array(z.object({
      name: z.string(),
      tableID: z.number(),
      columnID: z.number(),
      dataTypeID: z.number(),
      dataTypeSize: z.number(),
      dataTypeModifier: z.number(),
      format: z.union([z.literal("text"), z.literal("binary")]),
    })),
  });

// Values as received, see RawDataRow.
export type DataRowMessage = {
  fieldCount: number;
  fields: (Buffer | null)[];
};

export const zDataRowMessage: z.ZodMiniType<DataRowMessage> = z.object({
  fieldCount: z.number(),
  fields: z.array(z.nullable(z.custom<Buffer>((v) => v instanceof Buffer))),
});

export type CommandCompleteMessage = {
  text: string;
};

export const zCommandCompleteMessage: z.ZodMiniType<CommandCompleteMessage> =
  z.object({
    text: z.string(),
  });

export type ParameterStatusMessage = {
  parameterName: string;
  parameterValue: string;
};

export const zParameterStatusMessage: z.ZodMiniType<ParameterStatusMessage> =
  z.object({
    parameterName: z.string(),
    parameterValue: z.string(),
  });

export type NoticeMessage = {
  severity?: string | undefined;
  message?: string | undefined;
  detail?: string | undefined;
  hint?: string | undefined;
};

export const zNoticeMessage: z.ZodMiniType<NoticeMessage> = z.object({
  severity: z.optional(z.string()),
  message: z.optional(z.string()),
  detail: z.optional(z.string()),
  hint: z.optional(z.string()),
});
