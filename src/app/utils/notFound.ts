import { Request, Response } from 'express';
import httpStatus from 'http-status';

const notFoundHandler = (req: Request, res: Response) => {
  res.status(httpStatus.NOT_FOUND).json({
    success: false,
    message: 'API not found!',
    error: {
      path: req.originalUrl,
      message: `Cannot ${req.method} ${req.path}`,
    },
  });
};

export default notFoundHandler;
