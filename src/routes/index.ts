import express, { Router } from 'express';

const router: Router = express.Router();

/* GET home page. */
router.get('/', (req, res) => {
  res.json({
    title: 'Inkwell',
    message: 'Welcome to Inkwell',
    blog: '/blog/',
    api: '/api/',
    admin: '/admin/',
    auth: '/api/auth',
  });
});

export default router;
