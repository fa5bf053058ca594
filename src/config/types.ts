export type AppConfig = Readonly<{
  hostsFile: string;
  redirectAddress: string;
  marker: string;
}>;
