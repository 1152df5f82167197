/**
 * Interface for Property Management System (PMS) integrations.
 * The PMS is the source of truth for listings and reservations.
 */

export interface PmsCredentials {
  accountId: string;
  apiSecret: string;
}

export interface PmsAccessToken {
  token: string;
  expiresAt: Date;
}

// A listing as normalized from the PMS.
export interface PmsListing {
  externalId: string;
  name: string;
  address: string | null;
  description: string | null;
  houseRules: string | null;
  wifiName: string | null;
  wifiPassword: string | null;
  checkInTime: string | null; // HH:mm
  checkOutTime: string | null; // HH:mm
}

// A reservation as normalized from the PMS.
export interface PmsReservation {
  externalId: string;
  listingExternalId: string;
  guestName: string | null;
  phoneLast4: string | null;
  arrivalDate: string; // ISO YYYY-MM-DD
  departureDate: string; // ISO YYYY-MM-DD
  checkInTime: string | null;
  checkOutTime: string | null;
  status: string;
  guestCount: number | null;
}

export interface IPmsAdapter {
  /** Human-readable name of this PMS (e.g. "Hostaway") */
  readonly pmsName: string;

  /** Exchange account credentials for an API token */
  authenticate(credentials: PmsCredentials): Promise<PmsAccessToken>;

  fetchListings(token: string): Promise<PmsListing[]>;

  /** Reservations for a listing with arrival between fromDate and toDate (inclusive) */
  fetchReservations(
    token: string,
    listingExternalId: string,
    fromDate: string,
    toDate: string,
  ): Promise<PmsReservation[]>;
}
