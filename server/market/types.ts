export type PricePoint = {
  time: string; // "YYYY-MM-DD HH:mm:ss", exchange-local
  price: number;
};

export type PriceSeries = {
  symbol: string;
  interval: "5min";
  timeZone: string;
  points: PricePoint[]; // ascending by time
};

export interface MarketDataFetcher {
  fetchIntraday(symbol: string): Promise<PriceSeries>;
}
