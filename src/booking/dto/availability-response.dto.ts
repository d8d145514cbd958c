export class AvailabilitySegment {
  start!: string;
  end!: string;
  busy!: boolean;
}

export class AvailabilityResponseDto {
  resourceId!: string;
  start!: string;
  end!: string;
  bookable!: boolean;
  /** True when the whole range can be booked. */
  free!: boolean;
  segments!: AvailabilitySegment[];
}
