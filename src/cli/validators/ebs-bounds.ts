export const EBS_VOLUME_TYPES = ['standard', 'gp2', 'gp3', 'io1', 'io2', 'st1', 'sc1'] as const;

export type EbsVolumeType = (typeof EBS_VOLUME_TYPES)[number];

export interface Bounds {
  readonly min: number;
  readonly max: number;
}

function bounds(min: number, max: number): Bounds {
  return Object.freeze({ min, max });
}

const TIB = 1024;

// GiB
export const EBS_VOLUME_TYPE_TO_VOLUME_SIZE_BOUNDS: Readonly<Partial<Record<string, Bounds>>> =
  Object.freeze({
    standard: bounds(1, TIB),
    gp2: bounds(1, 16 * TIB),
    gp3: bounds(1, 16 * TIB),
    io1: bounds(4, 16 * TIB),
    io2: bounds(4, 16 * TIB),
    st1: bounds(500, 16 * TIB),
    sc1: bounds(500, 16 * TIB),
  });

export const EBS_VOLUME_IOPS_BOUNDS: Readonly<Partial<Record<string, Bounds>>> = Object.freeze({
  io1: bounds(100, 64000),
  io2: bounds(100, 64000),
  gp3: bounds(3000, 16000),
});

// Max provisioned IOPS per GiB
export const EBS_VOLUME_TYPE_TO_IOPS_RATIO: Readonly<Partial<Record<string, number>>> =
  Object.freeze({
    io1: 50,
    io2: 500,
    gp3: 500,
  });

// MB/s
export const GP3_THROUGHPUT_BOUNDS = bounds(125, 1000);

export const GP3_MAX_THROUGHPUT_TO_IOPS_RATIO = 0.25;

export const GP3_DEFAULT_IOPS = 3000;
export const GP3_DEFAULT_THROUGHPUT = 125;
