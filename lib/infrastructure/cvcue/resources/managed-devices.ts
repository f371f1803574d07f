/**
 * Managed Devices Resource
 *
 * Access point listing for CV-CUE with:
 * - Single page fetch with sort, feature flags and filters
 * - Automatic pagination into a complete collection
 */

import { InvalidPaginationError, PaginationLimitError } from "../errors";
import type { QueryParams } from "../client/http-client";
import { FilterBuilder, type LogicalOperator } from "../filters/filter-builder";
import type { Filter } from "../filters/filter";
import type { ManagedDevice, ManagedDevicesPage } from "../types/api-responses";
import { BaseResource } from "./base";

export const MANAGED_DEVICES_PATH = "/manageddevices/aps";
export const MANAGED_DEVICES_API_VERSION = "19";

export interface ListApsOptions {
  startIndex?: number; // default: 0
  pageSize?: number; // default: 10
  totalCountRequired?: boolean;
  locationId?: number;
  sortBy?: string; // default: "boxid"
  ascending?: boolean; // default: true
  fetchRadios?: boolean; // default: true
  populateMeshInfo?: boolean;
  populateWiredInterfaces?: boolean;
  /** A FilterBuilder carries its own operator; a plain list uses `filterOperator` */
  filters?: FilterBuilder | readonly Filter[];
  filterOperator?: LogicalOperator;
  /**
   * Simple filters and any other query parameters, sent as-is
   * (e.g. `{ active: true, model: ["AP-555", "AP-635"] }`)
   */
  extraParams?: QueryParams;
}

export interface GetAllApsOptions extends Omit<ListApsOptions, "startIndex" | "totalCountRequired"> {
  /** Devices per request (default: 100) */
  pageSize?: number;
  /** Maximum number of requests; unbounded when omitted */
  maxPages?: number;
  /** Called after each non-empty page with the running total */
  onPage?: (fetched: number, page: ManagedDevicesPage) => void;
}

export class ManagedDevicesResource extends BaseResource {
  /**
   * Fetch one page of managed devices (access points)
   */
  async listAps(options: ListApsOptions = {}): Promise<ManagedDevicesPage> {
    const pageSize = options.pageSize ?? 10;
    assertPageSize(pageSize);

    const params: QueryParams = {
      startindex: options.startIndex ?? 0,
      pagesize: pageSize,
      totalcountrequired: options.totalCountRequired ?? false,
      sortby: options.sortBy ?? "boxid",
      ascending: options.ascending ?? true,
      fetchradios: options.fetchRadios ?? true,
      populatemeshinfo: options.populateMeshInfo ?? false,
      populatewiredinterfaces: options.populateWiredInterfaces ?? false,
    };

    if (options.locationId !== undefined) {
      params.locationid = options.locationId;
    }

    Object.assign(params, buildFilterParams(options.filters, options.filterOperator ?? "AND"));
    Object.assign(params, options.extraParams);

    const page = await this.request<ManagedDevicesPage>("GET", MANAGED_DEVICES_PATH, {
      params,
      headers: { Version: MANAGED_DEVICES_API_VERSION },
    });
    // An empty body is a page with no devices
    return page ?? {};
  }

  /**
   * Fetch every managed device across all pages.
   *
   * Pages are requested in order until one comes back empty or shorter than
   * `pageSize`, so an exactly full last page costs one extra empty request.
   *
   * @throws PaginationLimitError when `maxPages` requests all returned full pages
   */
  async getAllAps(options: GetAllApsOptions = {}): Promise<ManagedDevice[]> {
    const { pageSize = 100, maxPages, onPage, ...listOptions } = options;
    assertPageSize(pageSize);
    if (maxPages !== undefined && (!Number.isInteger(maxPages) || maxPages < 1)) {
      throw new InvalidPaginationError(`maxPages must be a positive integer, got ${maxPages}`);
    }

    const allDevices: ManagedDevice[] = [];
    let startIndex = 0;
    let pagesFetched = 0;
    let hasMore = true;

    while (hasMore) {
      if (maxPages !== undefined && pagesFetched >= maxPages) {
        throw new PaginationLimitError(maxPages, allDevices.length, MANAGED_DEVICES_PATH);
      }

      const page = await this.listAps({
        ...listOptions,
        startIndex,
        pageSize,
        totalCountRequired: false,
      });
      pagesFetched++;

      const devices = page.managedDevices ?? [];
      if (devices.length === 0) {
        break;
      }

      allDevices.push(...devices);
      onPage?.(allDevices.length, page);

      if (devices.length < pageSize) {
        hasMore = false; // Last page
      } else {
        startIndex += pageSize;
      }
    }

    return allDevices;
  }
}

function buildFilterParams(
  filters: FilterBuilder | readonly Filter[] | undefined,
  filterOperator: LogicalOperator,
): QueryParams {
  if (filters === undefined) {
    return {};
  }
  if (filters instanceof FilterBuilder) {
    return { ...filters.toQueryParams() };
  }
  if (filters.length === 0) {
    return {};
  }
  return {
    filter: filters.map((f) => f.toString()),
    operator: filterOperator,
  };
}

function assertPageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new InvalidPaginationError(`pageSize must be a positive integer, got ${pageSize}`);
  }
}
