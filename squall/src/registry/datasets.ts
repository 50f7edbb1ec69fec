/**
 * Dataset registry for the tornado prediction pipeline.
 * Each definition is plain data handed to a DatasetClient; datasets differ in
 * where their files live, not in how they are transferred.
 */

// ============================================================================
// Types
// ============================================================================

export interface DatasetDefinition {
  id: string;
  name: string;

  /** Managed bucket holding curated copies, resolved through the proxy */
  bucket?: string;

  /** Archives that make up the dataset, in download order */
  knownLocators: readonly string[];

  /** Where downloads land when the caller gives no directory */
  defaultOutputDir: string;

  /** Index of the dataset's samples (CSV) */
  catalogUrl?: string;

  /** Public buckets keyed by region, for datasets served straight from S3 */
  publicBuckets?: Readonly<Record<string, string>>;

  /** Product prefix inside the public buckets */
  product?: string;

  /** Years covered */
  years: readonly number[];

  attribution: string;
  attributionUrl: string;
}

// ============================================================================
// TorNet (MIT Lincoln Laboratory, hosted on Zenodo)
// ============================================================================

export const TORNET: DatasetDefinition = {
  id: 'tornet',
  name: 'TorNet tornado radar samples',
  knownLocators: [
    'https://zenodo.org/records/12636522/files/tornet_2013.tar.gz?download=1',
    'https://zenodo.org/records/12637032/files/tornet_2014.tar.gz?download=1',
    'https://zenodo.org/records/12655151/files/tornet_2015.tar.gz?download=1',
    'https://zenodo.org/records/12655179/files/tornet_2016.tar.gz?download=1',
    'https://zenodo.org/records/12655183/files/tornet_2017.tar.gz?download=1',
    'https://zenodo.org/records/12655187/files/tornet_2018.tar.gz?download=1',
    'https://zenodo.org/records/12655716/files/tornet_2019.tar.gz?download=1',
    'https://zenodo.org/records/12655717/files/tornet_2020.tar.gz?download=1',
    'https://zenodo.org/records/12655718/files/tornet_2021.tar.gz?download=1',
    'https://zenodo.org/records/12655719/files/tornet_2022.tar.gz?download=1',
  ],
  defaultOutputDir: './data_tornet',
  catalogUrl: 'https://zenodo.org/records/12636522/files/catalog.csv?download=1',
  years: [2013, 2014, 2015, 2016, 2017, 2018, 2019, 2020, 2021, 2022],
  attribution: 'TorNet (MIT Lincoln Laboratory)',
  attributionUrl: 'https://zenodo.org/records/12636522',
};

// ============================================================================
// GOES-16/17 ABI imagery (NOAA open data on AWS)
// ============================================================================

export const GOES: DatasetDefinition = {
  id: 'goes',
  name: 'GOES ABI cloud and moisture imagery',
  bucket: 'TornadoPrediction-GOES',
  knownLocators: [],
  defaultOutputDir: './data_goes',
  catalogUrl: 'https://f000.backblazeb2.com/file/TornadoPrediction-GOES/goes.csv',
  publicBuckets: {
    east: 'noaa-goes16',
    west: 'noaa-goes17',
  },
  product: 'ABI-L2-MCMIPC',
  years: [2017, 2018, 2019, 2020, 2021, 2022],
  attribution: 'NOAA GOES-R Series (Registry of Open Data on AWS)',
  attributionUrl: 'https://registry.opendata.aws/noaa-goes/',
};

// ============================================================================
// Registry
// ============================================================================

export const DATASETS: readonly DatasetDefinition[] = [TORNET, GOES];

export function getDataset(id: string): DatasetDefinition | undefined {
  return DATASETS.find((d) => d.id === id);
}

export function getDatasetIds(): string[] {
  return DATASETS.map((d) => d.id);
}
