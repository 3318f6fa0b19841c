import axios, { AxiosInstance } from 'axios';
import { fileURLToPath } from 'url';
import { appConfig } from '../../config';
import { getUriScheme } from '../../utils/uri';
import { TransportError } from '../../utils/errors';
import { FileInputStream } from './FileInputStream';
import { HttpInputStream } from './HttpInputStream';
import { InputStream, OpenInputStream } from './InputStream';

let sharedHttp: AxiosInstance | null = null;

function defaultHttp(): AxiosInstance {
  if (!sharedHttp) {
    sharedHttp = axios.create({
      timeout: appConfig.http.timeoutMs,
      maxRedirects: 5,
      headers: { Accept: '*/*' },
    });
  }
  return sharedHttp;
}

/**
 * Open `uri` for reading: http(s) through axios, `file://` URIs and plain
 * paths from disk. Any other scheme is a transport error.
 */
export async function openInputStream(uri: string, http?: AxiosInstance): Promise<InputStream> {
  const scheme = getUriScheme(uri);

  if (scheme === 'http' || scheme === 'https') {
    return new HttpInputStream(uri, http ?? defaultHttp());
  }

  if (scheme === 'file') {
    let path: string;
    try {
      path = fileURLToPath(uri);
    } catch (error) {
      throw new TransportError(`Invalid file URI: ${uri}`, uri, error);
    }
    return FileInputStream.open(path);
  }

  if (scheme === null) {
    return FileInputStream.open(uri);
  }

  throw new TransportError(`Unsupported input scheme "${scheme}"`, uri);
}

/** `openInputStream` bound to a specific HTTP client. */
export function createStreamOpener(http: AxiosInstance): OpenInputStream {
  return (uri: string) => openInputStream(uri, http);
}
