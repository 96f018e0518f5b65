import { ValidatedConfiguration } from '../../config/validated';
import { logger } from '../../lib/logger';
import { BattleLinkMode } from '../../shared/enums';
import { FetchError } from '../../shared/errors';
import { TypeSafeHttpClient } from '../../shared/http/TypeSafeHttpClient';
import { mapBattleDataDtoToDomain } from '../../shared/mappers/dto.mapper';
import { WarBeaconResponse, WarBeaconResponseSchema } from '../../shared/schemas/api-responses';
import type { HttpTransport } from '../../shared/types/api';
import { relatedTimeToIso } from '../../shared/utilities/time';
import type { BattleData } from '../../domain/battle/Killmail';
import type { BattleLink } from '../../domain/battle/BattleLink';

export interface WarBeaconClientOptions {
  baseUrl: string;
  timeout: number;
  userAgent: string;
}

/**
 * Anything that can turn a battle link into battle data
 */
export interface BattleDataSource {
  fetchBattle(link: BattleLink, signal?: AbortSignal): Promise<BattleData>;
}

/**
 * Client for the WarBeacon battle-report API.
 * One request per link, no caching.
 */
export class WarBeaconClient implements BattleDataSource {
  private readonly client: TypeSafeHttpClient;

  constructor(options: WarBeaconClientOptions, transport?: HttpTransport) {
    this.client = new TypeSafeHttpClient(
      {
        baseURL: options.baseUrl,
        timeout: options.timeout,
        headers: {
          'User-Agent': options.userAgent,
        },
      },
      transport
    );
  }

  static fromConfig(transport?: HttpTransport): WarBeaconClient {
    return new WarBeaconClient(
      {
        baseUrl: ValidatedConfiguration.apis.warbeacon.baseUrl,
        timeout: ValidatedConfiguration.http.timeout,
        userAgent: ValidatedConfiguration.http.userAgent,
      },
      transport
    );
  }

  /**
   * Fetch the killmails, names and locations behind a battle link
   */
  async fetchBattle(link: BattleLink, signal?: AbortSignal): Promise<BattleData> {
    const options = {
      headers: { Referer: link.url, Accept: 'application/json' },
      signal,
    };

    logger.info({ mode: link.mode, url: link.url }, 'Fetching battle report from WarBeacon');

    let response: WarBeaconResponse;
    let endpoint: string;
    if (link.mode === BattleLinkMode.SINGLE_SYSTEM) {
      endpoint = '/api/br/auto';
      response = await this.client.post(
        endpoint,
        WarBeaconResponseSchema,
        { locations: [{ id: link.systemId, middleTime: relatedTimeToIso(link.timestamp) }] },
        options
      );
    } else {
      endpoint = `/api/br/report/${encodeURIComponent(link.reportId)}`;
      response = await this.client.get(endpoint, WarBeaconResponseSchema, options);
    }

    if (!response.success) {
      throw FetchError.invalidResponse('API reported failure', endpoint);
    }

    const data = mapBattleDataDtoToDomain(response.data);
    logger.debug(
      { url: link.url, killmails: data.killmails.length, locations: data.locations.length },
      'Battle report received'
    );
    return data;
  }
}
