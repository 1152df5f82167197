import { pmsListingSchema, pmsReservationSchema } from '../validation';
import type {
  IPmsAdapter,
  PmsAccessToken,
  PmsCredentials,
  PmsListing,
  PmsReservation,
} from '../interfaces/pms';

/**
 * Stub PMS adapter. Serves listings and reservations from memory so sync
 * can run without Hostaway. Set `failure` to make every call reject.
 */
export class StubPmsAdapter implements IPmsAdapter {
  readonly pmsName = 'StubPMS';
  failure: Error | null = null;
  readonly calls: string[] = [];

  private listings: PmsListing[] = [];
  private reservations: PmsReservation[] = [];

  setListings(listings: PmsListing[]): void {
    this.listings = listings.map((listing) => pmsListingSchema.parse(listing));
  }

  setReservations(reservations: PmsReservation[]): void {
    this.reservations = reservations.map((reservation) => pmsReservationSchema.parse(reservation));
  }

  async authenticate(credentials: PmsCredentials): Promise<PmsAccessToken> {
    this.calls.push(`authenticate:${credentials.accountId}`);
    this.throwIfFailing();
    return {
      token: `stub-token-${credentials.accountId}`,
      expiresAt: new Date(Date.now() + 60 * 60 * 1000),
    };
  }

  async fetchListings(_token: string): Promise<PmsListing[]> {
    this.calls.push('fetchListings');
    this.throwIfFailing();
    return [...this.listings];
  }

  async fetchReservations(
    _token: string,
    listingExternalId: string,
    fromDate: string,
    toDate: string,
  ): Promise<PmsReservation[]> {
    this.calls.push(`fetchReservations:${listingExternalId}`);
    this.throwIfFailing();
    return this.reservations.filter(
      (r) =>
        r.listingExternalId === listingExternalId &&
        r.arrivalDate >= fromDate &&
        r.arrivalDate <= toDate,
    );
  }

  private throwIfFailing(): void {
    if (this.failure) throw this.failure;
  }
}
