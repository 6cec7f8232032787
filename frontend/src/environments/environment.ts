export const environment = {
  production: false,
  // Overridden by API_URL; docker-compose style deployments point this at the api service
  apiUrl: 'http://127.0.0.1:8000',
  // Four model round trips can take a while
  requestTimeoutMs: 180000
};
