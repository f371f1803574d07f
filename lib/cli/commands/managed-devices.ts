/**
 * `cv-cue managed-devices list-aps|get-all-aps`
 */

import { parseArgs } from "node:util";
import { withCvCueClient, type CvCueClient } from "../../infrastructure/cvcue/client/cvcue-client";
import type { QueryParams } from "../../infrastructure/cvcue/client/http-client";
import {
  formatDeviceList,
  formatDevicePage,
  type FetchAllOutputFormat,
  type ListOutputFormat,
} from "../../formatters/managed-device-formatter";
import {
  buildFilters,
  parseBooleanOption,
  parseChoice,
  parseFilterOperator,
  parseInteger,
  parseOptionalInteger,
  parseOrUsage,
  VERBOSE_OPTION,
} from "../args";
import { applyCommandVerbosity, createCliLogger, type CliContext } from "../context";

const LIST_OUTPUTS: readonly ListOutputFormat[] = ["json", "table", "compact"];
const FETCH_ALL_OUTPUTS: readonly FetchAllOutputFormat[] = ["json", "count"];

/**
 * Log in first when the cached session is missing or expired
 */
async function ensureSession(client: CvCueClient, ctx: CliContext): Promise<void> {
  if (await client.isSessionActive()) {
    return;
  }
  if (ctx.verbose) {
    ctx.io.err("Session not active, logging in...");
  }
  await client.login();
}

function simpleFilters(active: boolean | undefined, model?: string[], name?: string[]): QueryParams {
  const params: QueryParams = {};
  if (active !== undefined) {
    params.active = active;
  }
  if (model && model.length > 0) {
    params.model = model;
  }
  if (name && name.length > 0) {
    params.name = name;
  }
  return params;
}

export async function listAps(args: string[], parent: CliContext): Promise<number> {
  const values = parseOrUsage(
    () =>
      parseArgs({
        args,
        options: {
          ...VERBOSE_OPTION,
          pagesize: { type: "string" },
          startindex: { type: "string" },
          "total-count": { type: "boolean", default: false },
          sortby: { type: "string", default: "boxid" },
          ascending: { type: "boolean" },
          descending: { type: "boolean" },
          active: { type: "string" },
          model: { type: "string", multiple: true },
          name: { type: "string", multiple: true },
          filter: { type: "string", multiple: true },
          "filter-operator": { type: "string" },
          output: { type: "string", short: "o" },
        },
        strict: true,
        allowPositionals: false,
      }).values,
  );

  const ctx = applyCommandVerbosity(parent, values.verbose);
  const pageSize = parseInteger("pagesize", values.pagesize, 10, 1);
  const startIndex = parseInteger("startindex", values.startindex, 0);
  const output = parseChoice("output", values.output, LIST_OUTPUTS, "json");
  const filters = buildFilters(values.filter, parseFilterOperator(values["filter-operator"]));
  const extraParams = simpleFilters(parseBooleanOption("active", values.active), values.model, values.name);
  const includeTotal = values["total-count"] === true;

  return withCvCueClient({ ...ctx.clientOptions, logger: createCliLogger(ctx.io, ctx.verbose) }, async (client) => {
    await ensureSession(client, ctx);

    const page = await client.managedDevices.listAps({
      pageSize,
      startIndex,
      totalCountRequired: includeTotal,
      sortBy: values.sortby,
      ascending: values.descending !== true,
      filters,
      extraParams,
    });

    ctx.io.out(formatDevicePage(page, output, includeTotal));
    return 0;
  });
}

export async function getAllAps(args: string[], parent: CliContext): Promise<number> {
  const values = parseOrUsage(
    () =>
      parseArgs({
        args,
        options: {
          ...VERBOSE_OPTION,
          pagesize: { type: "string" },
          active: { type: "string" },
          model: { type: "string", multiple: true },
          filter: { type: "string", multiple: true },
          "filter-operator": { type: "string" },
          "max-pages": { type: "string" },
          output: { type: "string", short: "o" },
        },
        strict: true,
        allowPositionals: false,
      }).values,
  );

  const ctx = applyCommandVerbosity(parent, values.verbose);
  const pageSize = parseInteger("pagesize", values.pagesize, 100, 1);
  const maxPages = parseOptionalInteger("max-pages", values["max-pages"], 1);
  const output = parseChoice("output", values.output, FETCH_ALL_OUTPUTS, "json");
  const filters = buildFilters(values.filter, parseFilterOperator(values["filter-operator"]));
  const extraParams = simpleFilters(parseBooleanOption("active", values.active), values.model);

  return withCvCueClient({ ...ctx.clientOptions, logger: createCliLogger(ctx.io, ctx.verbose) }, async (client) => {
    await ensureSession(client, ctx);

    if (ctx.verbose) {
      ctx.io.err("Fetching all devices (this may take a while)...");
    }

    const devices = await client.managedDevices.getAllAps({
      pageSize,
      maxPages,
      filters,
      extraParams,
      onPage: ctx.verbose ? (fetched) => ctx.io.err(`Fetched ${fetched} devices...`) : undefined,
    });

    ctx.io.out(formatDeviceList(devices, output));
    return 0;
  });
}
