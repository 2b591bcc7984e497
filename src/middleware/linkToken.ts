import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { LinkTokenGuard } from '../security/linkToken';
import { ClientRequest } from '../utils/ipExtractor';

declare global {
  namespace Express {
    interface Locals {
      linkToken?: string;
      linkTokenUrl?: string;
      suspicious?: boolean;
    }
  }
}

export function linkTokenUrl(token: string): string {
  return `/client${token}.css`;
}

function toClientRequest(req: Request): ClientRequest {
  return {
    headers: req.headers,
    remoteAddress: req.socket.remoteAddress,
  };
}

/**
 * Routes for /client<token>.css. The answer is always an empty stylesheet,
 * so a client can't learn whether its token was accepted.
 */
export function createLinkTokenRouter(guard: LinkTokenGuard): Router {
  const router = Router();

  const handler = async (req: Request, res: Response) => {
    await guard.ping(toClientRequest(req), req.params.token ?? '');
    res.set('Cache-Control', 'no-store');
    res.type('text/css').send('');
  };

  router.get('/client:token.css', (req, res, next) => {
    handler(req, res).catch(next);
  });
  router.post('/client:token.css', (req, res, next) => {
    handler(req, res).catch(next);
  });

  return router;
}

/**
 * Expose the current token and stylesheet URL to page rendering
 */
export function linkTokenLocals(guard: LinkTokenGuard): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    guard.getToken()
      .then((token) => {
        res.locals.linkToken = token;
        res.locals.linkTokenUrl = linkTokenUrl(token);
        next();
      })
      .catch(next);
  };
}

/**
 * Rate the request for a downstream limiter: res.locals.suspicious.
 * Requests whose network can't be resolved are left unrated.
 */
export function suspicionCheck(guard: LinkTokenGuard, options: { renew?: boolean } = {}): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const network = guard.resolveNetwork(toClientRequest(req));
    if (!network) {
      next();
      return;
    }

    guard.isSuspicious(network.compressed, req.headers, options.renew ?? false)
      .then((suspicious) => {
        res.locals.suspicious = suspicious;
        next();
      })
      .catch(next);
  };
}
